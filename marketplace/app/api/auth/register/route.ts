import { register } from "@/lib/accounts";
import { ok, readBody, route } from "@/lib/http";
import { registerSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("auth register", async (request) => {
  const input = await readBody(request, registerSchema);
  return ok({ ...(await register(input)) }, 201);
});
