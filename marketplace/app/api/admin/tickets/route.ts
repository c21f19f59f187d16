import { requireAdmin } from "@/lib/auth";
import { intParam, ok, route, searchParams } from "@/lib/http";
import { allTickets } from "@/lib/support";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("admin tickets", async (request) => {
  await requireAdmin(request);
  const query = searchParams(request);
  const skip = intParam(query, "skip", 0);
  const limit = intParam(query, "limit", 50, 200);
  return ok({ ...(await allTickets(query.get("status"), skip, limit)), skip, limit });
});
