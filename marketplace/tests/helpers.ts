import { newUser } from "@/lib/accounts";
import { createAccessToken, hashPassword } from "@/lib/auth";
import { setMailer, type Mailer, type OutgoingEmail } from "@/lib/email/mailer";
import { ApiError } from "@/lib/http";
import { MemoryStore } from "@/lib/memoryStore";
import {
  setPaymentGateway,
  type CheckoutSession,
  type CreateSessionInput,
  type PaymentGateway,
  type SessionStatus,
  type WebhookEvent
} from "@/lib/payments";
import { MemoryBlobStore, setBlobStore } from "@/lib/storage";
import { getStore, setStore } from "@/lib/store";
import { newId, nowIso } from "@/lib/time";
import type { Product, Transaction, User } from "@/lib/types";

export class RecordingMailer implements Mailer {
  readonly sent: OutgoingEmail[] = [];
  accept = true;

  async send(email: OutgoingEmail): Promise<boolean> {
    this.sent.push(email);
    return this.accept;
  }
}

type FakeSession = { input: CreateSessionInput; status: SessionStatus };

export class FakeGateway implements PaymentGateway {
  readonly sessions = new Map<string, FakeSession>();
  readonly refunds: Array<{ paymentIntentId: string; amountCents?: number }> = [];
  private counter = 0;

  async createCheckoutSession(input: CreateSessionInput): Promise<CheckoutSession> {
    this.counter += 1;
    const id = `cs_test_${this.counter}`;
    const amount_total = input.lines.reduce((sum, l) => sum + Math.round(l.amount * 100), 0);
    this.sessions.set(id, {
      input,
      status: {
        id,
        status: "open",
        payment_status: "unpaid",
        amount_total,
        currency: "eur",
        payment_intent_id: null,
        metadata: input.metadata
      }
    });
    return { id, url: `https://checkout.test/${id}` };
  }

  /** Marks the session as paid, the way a completed checkout reports it. */
  pay(sessionId: string, paymentIntentId = "pi_test_1"): SessionStatus {
    const session = this.session(sessionId);
    session.status = { ...session.status, status: "complete", payment_status: "paid", payment_intent_id: paymentIntentId };
    return session.status;
  }

  expire(sessionId: string): SessionStatus {
    const session = this.session(sessionId);
    session.status = { ...session.status, status: "expired" };
    return session.status;
  }

  async expireSession(sessionId: string): Promise<SessionStatus> {
    const session = this.session(sessionId);
    if (session.status.status !== "open") throw new ApiError(400, "session_not_open");
    return this.expire(sessionId);
  }

  session(sessionId: string): FakeSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new Error(`unknown session ${sessionId}`);
    return session;
  }

  async getSessionStatus(sessionId: string): Promise<SessionStatus> {
    return this.session(sessionId).status;
  }

  async refund(paymentIntentId: string, amountCents?: number): Promise<{ id: string; status: string }> {
    this.refunds.push({ paymentIntentId, amountCents });
    return { id: `re_test_${this.refunds.length}`, status: "succeeded" };
  }

  parseWebhook(payload: string, signature: string): WebhookEvent {
    if (signature !== "valid") throw new ApiError(400, "invalid_signature");
    const session = this.session(payload);
    return { state: "paid", session: session.status };
  }
}

export type Harness = { store: MemoryStore; blobs: MemoryBlobStore; gateway: FakeGateway; mailer: RecordingMailer };

export function installFakes(): Harness {
  const store = new MemoryStore();
  const blobs = new MemoryBlobStore("test-bucket");
  const gateway = new FakeGateway();
  const mailer = new RecordingMailer();
  setStore(store);
  setBlobStore(blobs);
  setPaymentGateway(gateway);
  setMailer(mailer);
  return { store, blobs, gateway, mailer };
}

export type TestUser = { user: User; token: string };

let userCounter = 0;

export async function createUser(overrides: Partial<User> = {}, password = "password123"): Promise<TestUser> {
  userCounter += 1;
  const base = newUser({
    email: `user${userCounter}@example.com`,
    name: `User ${userCounter}`,
    hashed_password: await hashPassword(password)
  });
  const user = await getStore().create("users", { ...base, ...overrides });
  return { user, token: await createAccessToken(user.id) };
}

export async function createListing(seller: User, overrides: Partial<Product> = {}): Promise<Product> {
  const product: Product = {
    id: newId(),
    title: "Oak dining table",
    description: "Solid oak table, seats six",
    price: 100,
    category: "Home & Garden",
    condition: "good",
    images: ["https://example.com/table.jpg"],
    pickup_address: "Damrak 1, Amsterdam",
    pickup_location: { address: "Damrak 1, Amsterdam", coordinates: { lat: 52.3676, lng: 4.9041 } },
    seller_id: seller.id,
    seller_name: seller.name,
    is_sold: false,
    is_featured: false,
    views: 0,
    created_at: nowIso(),
    ...overrides
  };
  return getStore().create("products", product);
}

export function transactionDoc(
  buyerId: string,
  sellerId: string,
  productId: string,
  overrides: Partial<Transaction> = {}
): Transaction {
  return {
    id: newId(),
    product_id: productId,
    buyer_id: buyerId,
    seller_id: sellerId,
    amount: 100,
    commission: 5,
    commission_rate: 0.05,
    total_amount: 105,
    currency: "eur",
    status: "held",
    payment_provider: "stripe",
    payment_session_id: null,
    payment_intent_id: null,
    delivery_status: "pending",
    delivery_notes: null,
    delivery_confirmed_at: null,
    auto_release_at: null,
    cart_checkout: false,
    created_at: "2024-05-10T09:00:00.000Z",
    paid_at: null,
    completed_at: null,
    cancelled_at: null,
    refunded_at: null,
    ...overrides
  };
}

export function jsonRequest(url: string, method = "GET", body?: unknown, token?: string): Request {
  const headers = new Headers();
  if (body !== undefined) headers.set("content-type", "application/json");
  if (token) headers.set("authorization", `Bearer ${token}`);
  return new Request(`http://localhost${url}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body)
  });
}

export const none: { params: Record<string, never> } = { params: {} };
