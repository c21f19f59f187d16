import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { markAllNotificationsRead } from "@/lib/notifications";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const PUT = route("notifications mark-all-read", async (request) => {
  const user = await requireUser(request);
  return ok({ marked: await markAllNotificationsRead(user.id) });
});
