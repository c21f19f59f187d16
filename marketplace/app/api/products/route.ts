import { requireUser } from "@/lib/auth";
import { createProduct, productQuerySchema, searchProducts } from "@/lib/catalog";
import { ok, parse, readBody, route, searchParams } from "@/lib/http";
import { productCreateSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("products list", async (request) => {
  const query = parse(productQuerySchema, Object.fromEntries(searchParams(request)));
  return ok({ products: await searchProducts(query) });
});

export const POST = route("products create", async (request) => {
  const user = await requireUser(request);
  const input = await readBody(request, productCreateSchema);
  return ok({ product: await createProduct(user, input) }, 201);
});
