import { requireAdmin } from "@/lib/auth";
import { intParam, ok, route, searchParams } from "@/lib/http";
import { listUsers } from "@/lib/moderation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("admin users", async (request) => {
  await requireAdmin(request);
  const query = searchParams(request);
  const skip = intParam(query, "skip", 0);
  const limit = intParam(query, "limit", 50, 200);
  return ok({ ...(await listUsers(query.get("search"), skip, limit)), skip, limit });
});
