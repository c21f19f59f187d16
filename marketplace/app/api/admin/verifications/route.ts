import { requireAdmin } from "@/lib/auth";
import { intParam, ok, route, searchParams } from "@/lib/http";
import { listVerifications } from "@/lib/moderation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("admin verifications", async (request) => {
  await requireAdmin(request);
  const query = searchParams(request);
  const { items, ...page } = await listVerifications(
    query.get("status"),
    intParam(query, "skip", 0),
    Math.max(intParam(query, "limit", 50, 200), 1)
  );
  return ok({ requests: items, ...page });
});
