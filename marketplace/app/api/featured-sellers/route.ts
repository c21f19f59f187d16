import { intParam, ok, route, searchParams } from "@/lib/http";
import { featuredSellers } from "@/lib/reviews";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("featured sellers", async (request) => {
  const limit = intParam(searchParams(request), "limit", 8, 50);
  return ok({ sellers: await featuredSellers(limit) });
});
