import { config } from "@/lib/config";
import { fail, intParam, ok, route, searchParams } from "@/lib/http";
import { ensureAdmin, seedDemoListings } from "@/lib/seed";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("admin seed", async (request) => {
  const query = searchParams(request);
  if ((query.get("secret") || "") !== config.seedSecret) {
    return fail(401, "unauthorized");
  }

  const { user, created } = await ensureAdmin();
  const demo = intParam(query, "products", 0, 500);
  const seeded = demo > 0 ? await seedDemoListings(demo) : { sellers: 0, products: 0 };
  return ok({ admin_email: user.email, admin_created: created, ...seeded });
});
