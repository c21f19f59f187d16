import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { clearNotifications } from "@/lib/notifications";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const DELETE = route("notifications clear-all", async (request) => {
  const user = await requireUser(request);
  return ok({ deleted: await clearNotifications(user.id) });
});
