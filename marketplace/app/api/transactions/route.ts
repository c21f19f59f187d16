import { requireUser } from "@/lib/auth";
import { transactionHistory } from "@/lib/history";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("transactions", async (request) => {
  const user = await requireUser(request);
  return ok({ transactions: await transactionHistory(user.id) });
});
