import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { listConversations } from "@/lib/messaging";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("messages conversations", async (request) => {
  const user = await requireUser(request);
  return ok({ conversations: await listConversations(user) });
});
