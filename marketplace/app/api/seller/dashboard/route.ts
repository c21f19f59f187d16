import { requireUser } from "@/lib/auth";
import { sellerDashboard } from "@/lib/dashboards";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("seller dashboard", async (request) => {
  const user = await requireUser(request);
  return ok({ ...(await sellerDashboard(user.id)) });
});
