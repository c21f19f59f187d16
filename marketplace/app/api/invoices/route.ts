import { requireUser } from "@/lib/auth";
import { userInvoices } from "@/lib/history";
import { ok, route, searchParams } from "@/lib/http";
import { historyFilters } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("invoices", async (request) => {
  const user = await requireUser(request);
  const invoices = await userInvoices(user.id, historyFilters(searchParams(request), "transaction_type"));
  return ok({ invoices, total: invoices.length });
});
