import { requireAdmin } from "@/lib/auth";
import { adminStats } from "@/lib/dashboards";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("admin stats", async (request) => {
  await requireAdmin(request);
  return ok({ ...(await adminStats()) });
});
