import { optionalUser } from "@/lib/auth";
import { recommendedProducts } from "@/lib/catalog";
import { intParam, ok, route, searchParams } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("products recommended", async (request) => {
  const limit = intParam(searchParams(request), "limit", 8, 50);
  const user = await optionalUser(request);
  return ok({ products: await recommendedProducts(user, limit) });
});
