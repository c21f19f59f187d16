import { featuredProducts } from "@/lib/catalog";
import { intParam, ok, route, searchParams } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("products featured", async (request) => {
  const limit = intParam(searchParams(request), "limit", 6, 50);
  return ok({ products: await featuredProducts(limit) });
});
