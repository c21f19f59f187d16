import { requireUser } from "@/lib/auth";
import { viewWishlist } from "@/lib/cart";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("wishlist", async (request) => {
  const user = await requireUser(request);
  return ok({ ...(await viewWishlist(user.id)) });
});
