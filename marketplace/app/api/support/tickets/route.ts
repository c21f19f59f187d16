import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { ticketCreateSchema } from "@/lib/schemas";
import { openTicket, userTickets } from "@/lib/support";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("support tickets", async (request) => {
  const user = await requireUser(request);
  return ok({ tickets: await userTickets(user.id) });
});

export const POST = route("support ticket create", async (request) => {
  const user = await requireUser(request);
  const input = await readBody(request, ticketCreateSchema);
  return ok({ ticket: await openTicket(user, input) }, 201);
});
