import { requireUser } from "@/lib/auth";
import { transactionHistory } from "@/lib/history";
import { ok, route, searchParams } from "@/lib/http";
import { historyFilters } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("transaction history", async (request) => {
  const user = await requireUser(request);
  const filters = historyFilters(searchParams(request), "role");
  const transactions = await transactionHistory(user.id, filters);
  return ok({ transactions, total: transactions.length });
});
