import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { unreadCount } from "@/lib/notifications";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("notifications unread-count", async (request) => {
  const user = await requireUser(request);
  return ok({ count: await unreadCount(user.id) });
});
