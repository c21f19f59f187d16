import { ApiError } from "./http";
import { notify } from "./notifications";
import { getMany, getStore } from "./store";
import { newId, nowIso } from "./time";
import type { Ticket, TicketReply, TicketStatus, User } from "./types";

export type TicketInput = Pick<Ticket, "subject" | "message" | "category" | "priority">;

export async function openTicket(user: User, input: TicketInput): Promise<Ticket> {
  const now = nowIso();
  const ticket: Ticket = { id: newId(), user_id: user.id, ...input, status: "open", created_at: now, updated_at: now };
  await getStore().create("support_tickets", ticket);
  // eslint-disable-next-line no-console
  console.log("[support] ticket opened", ticket.id, "by", user.id);
  return ticket;
}

export async function userTickets(userId: string): Promise<Ticket[]> {
  return getStore().list("support_tickets", {
    where: [["user_id", "==", userId]],
    orderBy: { field: "created_at", direction: "desc" }
  });
}

async function requireTicket(ticketId: string): Promise<Ticket> {
  const ticket = await getStore().get("support_tickets", ticketId);
  if (!ticket) throw new ApiError(404, "ticket_not_found");
  return ticket;
}

async function ownTicket(user: User, ticketId: string): Promise<Ticket> {
  const ticket = await requireTicket(ticketId);
  if (ticket.user_id !== user.id) throw new ApiError(403, "forbidden");
  return ticket;
}

export async function ticketThread(user: User, ticketId: string): Promise<{ ticket: Ticket; replies: TicketReply[] }> {
  const ticket = await ownTicket(user, ticketId);
  const replies = await getStore().list("support_ticket_replies", {
    where: [["ticket_id", "==", ticketId]],
    orderBy: { field: "created_at", direction: "asc" }
  });
  return { ticket, replies };
}

async function addReply(ticket: Ticket, author: User, message: string, isStaff: boolean): Promise<TicketReply> {
  const store = getStore();
  const reply: TicketReply = {
    id: newId(),
    ticket_id: ticket.id,
    user_id: author.id,
    message,
    is_staff: isStaff,
    created_at: nowIso()
  };
  await store.create("support_ticket_replies", reply);
  await store.update("support_tickets", ticket.id, { updated_at: reply.created_at });
  return reply;
}

export async function replyToTicket(user: User, ticketId: string, message: string): Promise<TicketReply> {
  return addReply(await ownTicket(user, ticketId), user, message, false);
}

export async function staffReply(admin: User, ticketId: string, message: string): Promise<TicketReply> {
  const ticket = await requireTicket(ticketId);
  const reply = await addReply(ticket, admin, message, true);
  await notify(ticket.user_id, {
    type: "support",
    title: "Support Team Replied",
    message: `You have a new response to your ticket: ${ticket.subject}`,
    link: "/support"
  });
  return reply;
}

/** Owners may only close their ticket; staff may set any status on any ticket. */
export async function setTicketStatus(user: User, ticketId: string, status: TicketStatus, asStaff = false): Promise<Ticket> {
  const ticket = asStaff ? await requireTicket(ticketId) : await ownTicket(user, ticketId);
  if (!asStaff && status !== "closed") throw new ApiError(400, "invalid_status");
  const updated_at = nowIso();
  await getStore().update("support_tickets", ticketId, { status, updated_at });
  return { ...ticket, status, updated_at };
}

export type AdminTicketView = Ticket & { user_name: string; user_email: string };

export async function allTickets(
  status: string | null,
  skip: number,
  limit: number
): Promise<{ tickets: AdminTicketView[]; total: number }> {
  const store = getStore();
  const where = status ? [["status", "==", status] as const] : [];
  const tickets = await store.list("support_tickets", {
    where,
    orderBy: { field: "created_at", direction: "desc" },
    offset: skip,
    limit
  });
  const users = await getMany(store, "users", tickets.map((t) => t.user_id));
  return {
    tickets: tickets.map((t) => ({
      ...t,
      user_name: users.get(t.user_id)?.name ?? "Unknown",
      user_email: users.get(t.user_id)?.email ?? "Unknown"
    })),
    total: await store.count("support_tickets", where)
  };
}
