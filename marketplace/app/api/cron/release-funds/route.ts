import { requireCronOrAdmin } from "@/lib/auth";
import { releaseDueFunds } from "@/lib/escrow";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const handler = route("cron release-funds", async (request) => {
  await requireCronOrAdmin(request);
  return ok({ ...(await releaseDueFunds()) });
});

export const GET = handler;
export const POST = handler;
