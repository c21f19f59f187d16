import { requireUser } from "@/lib/auth";
import { intParam, ok, route, searchParams } from "@/lib/http";
import { listNotifications } from "@/lib/notifications";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("notifications", async (request) => {
  const user = await requireUser(request);
  const limit = intParam(searchParams(request), "limit", 50, 200);
  return ok({ notifications: await listNotifications(user.id, limit) });
});
