import { reconcileSession } from "@/lib/escrow";
import { ApiError, ok, route } from "@/lib/http";
import { getPaymentGateway } from "@/lib/payments";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("payments webhook", async (request) => {
  const signature = request.headers.get("stripe-signature");
  if (!signature) throw new ApiError(400, "invalid_signature");

  const event = getPaymentGateway().parseWebhook(await request.text(), signature);
  if (event.state === "ignored") return ok({ received: true, ignored: event.type });

  const record = await reconcileSession(event.session, event.state);
  return ok({ received: true, payment_status: record?.payment_status ?? null });
});
