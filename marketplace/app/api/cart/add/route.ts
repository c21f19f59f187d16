import { requireUser } from "@/lib/auth";
import { addToCart } from "@/lib/cart";
import { ok, readBody, route } from "@/lib/http";
import { cartAddSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("cart add", async (request) => {
  const user = await requireUser(request);
  const { product_id } = await readBody(request, cartAddSchema);
  return ok({ cart: await addToCart(user, product_id) });
});
