import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { createRating } from "@/lib/reviews";
import { ratingCreateSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("ratings create", async (request) => {
  const user = await requireUser(request);
  const input = await readBody(request, ratingCreateSchema);
  return ok({ rating: await createRating(user, input) }, 201);
});
