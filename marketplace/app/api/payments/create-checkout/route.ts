import { requireUser } from "@/lib/auth";
import { checkoutProduct } from "@/lib/escrow";
import { ok, parse, readJson, route, searchParams } from "@/lib/http";
import { checkoutSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("payments create-checkout", async (request) => {
  const user = await requireUser(request);
  // Older clients send product_id and origin_url as query parameters.
  const body = await readJson(request);
  const input = parse(checkoutSchema, { ...Object.fromEntries(searchParams(request)), ...(isObject(body) ? body : {}) });

  const result = await checkoutProduct(user, input.product_id, input.origin_url);
  const [transaction_id] = result.transaction_ids;
  return ok({ ...result, transaction_id });
});

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
