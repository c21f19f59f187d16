import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { requestVerification } from "@/lib/moderation";
import { verificationRequestSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("verification request", async (request) => {
  const user = await requireUser(request);
  const { documents } = await readBody(request, verificationRequestSchema);
  return ok({ request: await requestVerification(user, documents) }, 201);
});
