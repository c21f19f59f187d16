import { ApiError } from "./http";
import { notify } from "./notifications";
import { getMany, getStore } from "./store";
import { newId, nowIso } from "./time";
import type { Attachment, Conversation, Message, User } from "./types";

type Side = "buyer" | "seller";

function sideOf(conversation: Conversation, userId: string): Side {
  if (conversation.buyer_id === userId) return "buyer";
  if (conversation.seller_id === userId) return "seller";
  throw new ApiError(403, "forbidden");
}

const unreadField = (side: Side) => (side === "buyer" ? "buyer_unread_count" : "seller_unread_count");

export function preview(content: string): string {
  const text = content.trim();
  return text ? text.slice(0, 100) : "[Attachment]";
}

export async function loadConversation(user: User, conversationId: string): Promise<{ conversation: Conversation; side: Side }> {
  const conversation = await getStore().get("conversations", conversationId);
  if (!conversation) throw new ApiError(404, "conversation_not_found");
  return { conversation, side: sideOf(conversation, user.id) };
}

async function appendMessage(
  conversation: Conversation,
  sender: User,
  side: Side,
  content: string,
  attachments: Attachment[]
): Promise<Message> {
  const store = getStore();
  const now = nowIso();
  const message: Message = {
    id: newId(),
    conversation_id: conversation.id,
    sender_id: sender.id,
    message: content,
    attachments,
    read: false,
    read_at: null,
    created_at: now
  };
  await store.create("messages", message);

  await store.update("conversations", conversation.id, {
    last_message: preview(content),
    last_message_at: now,
    updated_at: now,
    ...(side === "buyer" ? { buyer_typing: false, buyer_typing_at: null } : { seller_typing: false, seller_typing_at: null })
  });
  await store.increment("conversations", conversation.id, unreadField(side === "buyer" ? "seller" : "buyer"), 1);

  const recipientId = side === "buyer" ? conversation.seller_id : conversation.buyer_id;
  const product = await store.get("products", conversation.product_id);
  await notify(recipientId, {
    type: "message",
    title: "New Message",
    message: `You have a new message about '${product?.title ?? "a product"}'`,
    link: "/messages"
  });
  return message;
}

export async function startConversation(
  user: User,
  input: { product_id: string; recipient_id: string; initial_message: string }
): Promise<{ conversation: Conversation; message: Message }> {
  const store = getStore();
  const product = await store.get("products", input.product_id);
  if (!product) throw new ApiError(404, "product_not_found");
  if (input.recipient_id === user.id) throw new ApiError(400, "cannot_message_self");
  const recipient = await store.get("users", input.recipient_id);
  if (!recipient) throw new ApiError(404, "user_not_found");

  const sellerInitiated = product.seller_id === user.id;
  const buyer_id = sellerInitiated ? input.recipient_id : user.id;
  const seller_id = sellerInitiated ? user.id : input.recipient_id;

  const [existing] = await store.list("conversations", {
    where: [
      ["product_id", "==", product.id],
      ["buyer_id", "==", buyer_id],
      ["seller_id", "==", seller_id]
    ],
    limit: 1
  });

  let conversation = existing;
  if (!conversation) {
    const now = nowIso();
    conversation = {
      id: newId(),
      product_id: product.id,
      buyer_id,
      seller_id,
      participants: [buyer_id, seller_id],
      last_message: "",
      last_message_at: null,
      buyer_unread_count: 0,
      seller_unread_count: 0,
      buyer_typing: false,
      seller_typing: false,
      buyer_typing_at: null,
      seller_typing_at: null,
      created_at: now,
      updated_at: now
    };
    await store.create("conversations", conversation);
  }

  const message = await appendMessage(conversation, user, sideOf(conversation, user.id), input.initial_message, []);
  return { conversation, message };
}

export async function sendMessage(
  user: User,
  conversationId: string,
  input: { content: string; attachments: Attachment[] }
): Promise<Message> {
  const { conversation, side } = await loadConversation(user, conversationId);
  return appendMessage(conversation, user, side, input.content, input.attachments);
}

async function markRead(conversation: Conversation, user: User, side: Side): Promise<number> {
  const store = getStore();
  const count = await store.updateWhere(
    "messages",
    [
      ["conversation_id", "==", conversation.id],
      ["sender_id", "!=", user.id],
      ["read", "==", false]
    ],
    { read: true, read_at: nowIso() }
  );
  await store.update("conversations", conversation.id, side === "buyer" ? { buyer_unread_count: 0 } : { seller_unread_count: 0 });
  return count;
}

/** Messages in ascending time order; `since` returns only newer ones for polling clients. */
export async function getMessages(user: User, conversationId: string, since: string | null): Promise<Message[]> {
  const { conversation, side } = await loadConversation(user, conversationId);
  const messages = await getStore().list("messages", {
    where: since
      ? [
          ["conversation_id", "==", conversation.id],
          ["created_at", ">", since]
        ]
      : [["conversation_id", "==", conversation.id]],
    orderBy: { field: "created_at", direction: "asc" }
  });
  await markRead(conversation, user, side);
  return messages;
}

export async function markConversationRead(user: User, conversationId: string): Promise<number> {
  const { conversation, side } = await loadConversation(user, conversationId);
  return markRead(conversation, user, side);
}

export async function setTyping(user: User, conversationId: string, isTyping: boolean): Promise<void> {
  const { conversation, side } = await loadConversation(user, conversationId);
  const at = isTyping ? nowIso() : null;
  await getStore().update(
    "conversations",
    conversation.id,
    side === "buyer" ? { buyer_typing: isTyping, buyer_typing_at: at } : { seller_typing: isTyping, seller_typing_at: at }
  );
}

export type ConversationSummary = {
  id: string;
  product_id: string;
  product_title: string;
  product_image: string | null;
  other_user_id: string;
  other_user_name: string;
  other_user_image: string | null;
  other_user_typing: boolean;
  last_message: string;
  last_message_at: string | null;
  unread_count: number;
  updated_at: string;
};

export async function listConversations(user: User): Promise<ConversationSummary[]> {
  const store = getStore();
  const conversations = await store.list("conversations", {
    where: [["participants", "array-contains", user.id]],
    orderBy: { field: "updated_at", direction: "desc" }
  });
  const products = await getMany(store, "products", conversations.map((c) => c.product_id));
  const others = await getMany(
    store,
    "users",
    conversations.map((c) => (c.buyer_id === user.id ? c.seller_id : c.buyer_id))
  );

  const out: ConversationSummary[] = [];
  for (const c of conversations) {
    const side = sideOf(c, user.id);
    const otherId = side === "buyer" ? c.seller_id : c.buyer_id;
    const product = products.get(c.product_id);
    const other = others.get(otherId);
    if (!product || !other) continue;
    out.push({
      id: c.id,
      product_id: c.product_id,
      product_title: product.title,
      product_image: product.images[0] ?? null,
      other_user_id: otherId,
      other_user_name: other.name,
      other_user_image: other.profile_image,
      other_user_typing: side === "buyer" ? c.seller_typing : c.buyer_typing,
      last_message: c.last_message,
      last_message_at: c.last_message_at,
      unread_count: side === "buyer" ? c.buyer_unread_count : c.seller_unread_count,
      updated_at: c.updated_at
    });
  }
  return out;
}
