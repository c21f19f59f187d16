import { trendingProducts } from "@/lib/catalog";
import { intParam, ok, route, searchParams } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("products trending", async (request) => {
  const limit = intParam(searchParams(request), "limit", 10, 50);
  return ok({ products: await trendingProducts(limit) });
});
