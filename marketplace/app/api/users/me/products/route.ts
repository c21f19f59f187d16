import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { getStore } from "@/lib/store";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("users me products", async (request) => {
  const user = await requireUser(request);
  const products = await getStore().list("products", {
    where: [["seller_id", "==", user.id]],
    orderBy: { field: "created_at", direction: "desc" }
  });
  return ok({ products });
});
