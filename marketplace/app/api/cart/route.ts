import { requireUser } from "@/lib/auth";
import { viewCart } from "@/lib/cart";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("cart", async (request) => {
  const user = await requireUser(request);
  return ok({ cart: await viewCart(user.id) });
});
