import Stripe from "stripe";
import { config } from "./config";
import { ApiError } from "./http";
import { CURRENCY, toCents } from "./money";

export type CheckoutLine = { name: string; amount: number };

export type CreateSessionInput = {
  lines: CheckoutLine[];
  successUrl: string;
  cancelUrl: string;
  metadata: Record<string, string>;
  customerEmail?: string;
};

export type CheckoutSession = { id: string; url: string };

export type SessionState = "pending" | "paid" | "expired" | "failed";

export type SessionStatus = {
  id: string;
  status: "open" | "complete" | "expired";
  payment_status: "paid" | "unpaid" | "no_payment_required";
  /** Cents. */
  amount_total: number;
  currency: string;
  payment_intent_id: string | null;
  metadata: Record<string, string>;
};

export type WebhookEvent = { state: SessionState; session: SessionStatus } | { state: "ignored"; type: string };

export interface PaymentGateway {
  createCheckoutSession(input: CreateSessionInput): Promise<CheckoutSession>;
  getSessionStatus(sessionId: string): Promise<SessionStatus>;
  /** Closes an open session so it can no longer be paid. */
  expireSession(sessionId: string): Promise<SessionStatus>;
  /** Amount in cents; omitted means a full refund. */
  refund(paymentIntentId: string, amountCents?: number): Promise<{ id: string; status: string }>;
  /** Throws ApiError(400, "invalid_signature") when the payload is not authentic. */
  parseWebhook(payload: string, signature: string): WebhookEvent;
}

export function sessionState(session: Pick<SessionStatus, "status" | "payment_status">): SessionState {
  if (session.payment_status === "paid" || session.payment_status === "no_payment_required") return "paid";
  if (session.status === "expired") return "expired";
  return "pending";
}

function toStatus(session: Stripe.Checkout.Session): SessionStatus {
  const intent = session.payment_intent;
  return {
    id: session.id,
    status: session.status ?? "open",
    payment_status: session.payment_status,
    amount_total: session.amount_total ?? 0,
    currency: session.currency ?? CURRENCY,
    payment_intent_id: typeof intent === "string" ? intent : intent?.id ?? null,
    metadata: session.metadata ?? {}
  };
}

export class StripeGateway implements PaymentGateway {
  private readonly stripe: Stripe;

  constructor(apiKey: string, private readonly webhookSecret: string | undefined) {
    this.stripe = new Stripe(apiKey);
  }

  async createCheckoutSession(input: CreateSessionInput): Promise<CheckoutSession> {
    const session = await this.stripe.checkout.sessions.create({
      mode: "payment",
      line_items: input.lines.map((line) => ({
        quantity: 1,
        price_data: { currency: CURRENCY, unit_amount: toCents(line.amount), product_data: { name: line.name } }
      })),
      success_url: input.successUrl,
      cancel_url: input.cancelUrl,
      metadata: input.metadata,
      customer_email: input.customerEmail
    });
    if (!session.url) throw new ApiError(502, "checkout_unavailable");
    return { id: session.id, url: session.url };
  }

  async getSessionStatus(sessionId: string): Promise<SessionStatus> {
    return toStatus(await this.stripe.checkout.sessions.retrieve(sessionId));
  }

  async expireSession(sessionId: string): Promise<SessionStatus> {
    return toStatus(await this.stripe.checkout.sessions.expire(sessionId));
  }

  async refund(paymentIntentId: string, amountCents?: number): Promise<{ id: string; status: string }> {
    const refund = await this.stripe.refunds.create({ payment_intent: paymentIntentId, amount: amountCents });
    return { id: refund.id, status: refund.status ?? "pending" };
  }

  parseWebhook(payload: string, signature: string): WebhookEvent {
    if (!this.webhookSecret) throw new ApiError(500, "webhook_not_configured");
    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(payload, signature, this.webhookSecret);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.warn("[payments webhook] signature check failed", e);
      throw new ApiError(400, "invalid_signature");
    }

    switch (event.type) {
      case "checkout.session.completed":
      case "checkout.session.async_payment_succeeded":
      case "checkout.session.expired": {
        const session = toStatus(event.data.object);
        return { state: sessionState(session), session };
      }
      case "checkout.session.async_payment_failed":
        return { state: "failed", session: toStatus(event.data.object) };
      default:
        return { state: "ignored", type: event.type };
    }
  }
}

let gatewayInstance: PaymentGateway | null = null;

export function getPaymentGateway(): PaymentGateway {
  if (gatewayInstance) return gatewayInstance;
  if (!config.stripeApiKey) throw new ApiError(503, "payments_not_configured");
  gatewayInstance = new StripeGateway(config.stripeApiKey, config.stripeWebhookSecret);
  return gatewayInstance;
}

export function setPaymentGateway(gateway: PaymentGateway | null): void {
  gatewayInstance = gateway;
}
