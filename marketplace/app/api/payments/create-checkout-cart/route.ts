import { requireUser } from "@/lib/auth";
import { checkoutCart } from "@/lib/escrow";
import { ok, readBody, route } from "@/lib/http";
import { cartCheckoutSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("payments create-checkout-cart", async (request) => {
  const user = await requireUser(request);
  const { origin_url } = await readBody(request, cartCheckoutSchema);
  return ok({ ...(await checkoutCart(user, origin_url)) });
});
