import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { startConversation } from "@/lib/messaging";
import { conversationCreateSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("conversations create", async (request) => {
  const user = await requireUser(request);
  const input = await readBody(request, conversationCreateSchema);
  const { conversation, message } = await startConversation(user, input);
  return ok({ conversation_id: conversation.id, conversation, message }, 201);
});
