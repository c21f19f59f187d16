import { login } from "@/lib/accounts";
import { ok, readBody, route } from "@/lib/http";
import { loginSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("auth login", async (request) => {
  const { email, password } = await readBody(request, loginSchema);
  return ok({ ...(await login(email, password)) });
});
