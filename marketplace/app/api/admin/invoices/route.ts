import { requireAdmin } from "@/lib/auth";
import { allInvoices } from "@/lib/history";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("admin invoices", async (request) => {
  await requireAdmin(request);
  const invoices = await allInvoices();
  return ok({ invoices, total: invoices.length });
});
