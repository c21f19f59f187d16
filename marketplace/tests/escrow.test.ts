import { beforeEach, describe, expect, it } from "vitest";
import { GET as cronRelease } from "@/app/api/cron/release-funds/route";
import { GET as checkoutStatusRoute } from "@/app/api/payments/checkout-status/[sessionId]/route";
import { POST as createCheckout } from "@/app/api/payments/create-checkout/route";
import { POST as createCartCheckout } from "@/app/api/payments/create-checkout-cart/route";
import { POST as releaseRoute } from "@/app/api/transactions/[id]/release-funds/route";
import { POST as webhook } from "@/app/api/webhook/stripe/route";
import { addToCart } from "@/lib/cart";
import {
  cancelTransaction,
  checkoutProduct,
  confirmDelivery,
  reconcileSession,
  releaseDueFunds,
  releaseFunds
} from "@/lib/escrow";
import { MemoryStore } from "@/lib/memoryStore";
import { setStore, type ListOptions } from "@/lib/store";
import type { CollectionName, Collections, Product, User } from "@/lib/types";
import { createListing, createUser, installFakes, jsonRequest, none, type Harness, type TestUser } from "./helpers";

const ORIGIN = "https://shop.example";
const DAY_MS = 86_400_000;

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

/** Yields before every read, the way a networked store interleaves callers. */
class LaggingStore extends MemoryStore {
  async get<K extends CollectionName>(collection: K, id: string): Promise<Collections[K] | null> {
    await tick();
    return super.get(collection, id);
  }

  async list<K extends CollectionName>(collection: K, options?: ListOptions<Collections[K]>): Promise<Collections[K][]> {
    await tick();
    return super.list(collection, options);
  }
}

describe("escrow", () => {
  let h: Harness;
  let seller: TestUser;
  let buyer: TestUser;
  let listing: Product;

  beforeEach(async () => {
    h = installFakes();
    seller = await createUser({ name: "Sam Seller" });
    buyer = await createUser({ name: "Bo Buyer" });
    listing = await createListing(seller.user, { price: 100 });
  });

  async function paidTransaction(who: User = buyer.user, product: Product = listing): Promise<string> {
    const checkout = await checkoutProduct(who, product.id, ORIGIN);
    await reconcileSession(h.gateway.pay(checkout.session_id));
    return checkout.transaction_ids[0];
  }

  it("creates a pending transaction and checkout session with commission on top", async () => {
    const res = await createCheckout(
      jsonRequest("/api/payments/create-checkout", "POST", { product_id: listing.id, origin_url: `${ORIGIN}/` }, buyer.token),
      none
    );
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.session_id).toBe("cs_test_1");
    expect(body.checkout_url).toBe("https://checkout.test/cs_test_1");
    expect(body.transaction_ids).toEqual([body.transaction_id]);

    const tx = await h.store.get("transactions", body.transaction_id);
    expect(tx).toMatchObject({
      status: "pending",
      amount: 100,
      commission: 5,
      total_amount: 105,
      currency: "eur",
      buyer_id: buyer.user.id,
      seller_id: seller.user.id,
      payment_session_id: "cs_test_1"
    });

    const session = h.gateway.session("cs_test_1");
    expect(session.input.successUrl).toBe(`${ORIGIN}/payment-success?session_id={CHECKOUT_SESSION_ID}`);
    expect(session.input.cancelUrl).toBe(`${ORIGIN}/browse`);
    expect(session.input.lines).toEqual([{ name: "Oak dining table", amount: 105 }]);

    const [record] = await h.store.list("payment_transactions");
    expect(record).toMatchObject({ session_id: "cs_test_1", amount: 105, payment_status: "pending" });
  });

  it("takes checkout parameters from the query string", async () => {
    const url = `/api/payments/create-checkout?product_id=${listing.id}&origin_url=${encodeURIComponent(ORIGIN)}`;
    const res = await createCheckout(jsonRequest(url, "POST", undefined, buyer.token), none);
    expect(res.status).toBe(200);
  });

  it("refuses to sell a listing to its own seller", async () => {
    await expect(checkoutProduct(seller.user, listing.id, ORIGIN)).rejects.toMatchObject({
      status: 400,
      code: "own_product"
    });
  });

  it("holds funds once the session is paid and issues one invoice", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    h.gateway.pay(checkout.session_id, "pi_test_42");

    const res = await checkoutStatusRoute(
      jsonRequest(`/api/payments/checkout-status/${checkout.session_id}`, "GET", undefined, buyer.token),
      { params: { sessionId: checkout.session_id } }
    );
    expect(await res.json()).toEqual({
      ok: true,
      status: "complete",
      payment_status: "paid",
      amount_total: 10500,
      currency: "eur",
      transaction_ids: checkout.transaction_ids
    });

    const tx = await h.store.get("transactions", checkout.transaction_ids[0]);
    expect(tx?.status).toBe("held");
    expect(tx?.payment_intent_id).toBe("pi_test_42");
    expect((await h.store.get("products", listing.id))?.is_sold).toBe(true);

    const invoices = await h.store.list("invoices");
    expect(invoices).toHaveLength(1);
    expect(invoices[0].invoice_number).toBe(`INV-${new Date().getUTCFullYear()}-00001`);
    expect(invoices[0].vat_amount).toBe(22.05);

    expect(h.mailer.sent.map((m) => m.subject)).toEqual([
      "🎉 Bestelling Bevestigd - Oak dining table",
      "💰 Nieuwe Verkoop - Oak dining table"
    ]);
    const sellerNotes = await h.store.list("notifications", { where: [["user_id", "==", seller.user.id]] });
    expect(sellerNotes.map((n) => n.title)).toEqual(["Item sold"]);

    // a second status poll changes nothing
    await checkoutStatusRoute(
      jsonRequest(`/api/payments/checkout-status/${checkout.session_id}`, "GET", undefined, buyer.token),
      { params: { sessionId: checkout.session_id } }
    );
    expect(await h.store.count("invoices")).toBe(1);
    expect(h.mailer.sent).toHaveLength(2);
  });

  it("only shows checkout status to the buyer", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    const res = await checkoutStatusRoute(
      jsonRequest(`/api/payments/checkout-status/${checkout.session_id}`, "GET", undefined, seller.token),
      { params: { sessionId: checkout.session_id } }
    );
    expect(res.status).toBe(403);
  });

  it("cancels pending transactions when the session expires", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    const record = await reconcileSession(h.gateway.expire(checkout.session_id));
    expect(record?.payment_status).toBe("expired");
    expect((await h.store.get("transactions", checkout.transaction_ids[0]))?.status).toBe("cancelled");
    expect((await h.store.get("products", listing.id))?.is_sold).toBe(false);
  });

  it("reconciles paid sessions from the webhook", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    h.gateway.pay(checkout.session_id);

    const unsigned = await webhook(new Request("http://localhost/api/webhook/stripe", { method: "POST", body: "x" }), none);
    expect(unsigned.status).toBe(400);

    const res = await webhook(
      new Request("http://localhost/api/webhook/stripe", {
        method: "POST",
        headers: { "stripe-signature": "valid" },
        body: checkout.session_id
      }),
      none
    );
    expect(await res.json()).toEqual({ ok: true, received: true, payment_status: "paid" });
    expect((await h.store.get("transactions", checkout.transaction_ids[0]))?.status).toBe("held");
  });

  it("checks out the whole cart in one session and empties it", async () => {
    const second = await createListing(seller.user, { title: "Bookshelf", price: 30 });
    await addToCart(buyer.user, listing.id);
    await addToCart(buyer.user, second.id);

    const res = await createCartCheckout(
      jsonRequest("/api/payments/create-checkout-cart", "POST", { origin_url: ORIGIN }, buyer.token),
      none
    );
    const body = await res.json();
    expect(body.transaction_ids).toHaveLength(2);
    expect(h.gateway.session(body.session_id).input.cancelUrl).toBe(`${ORIGIN}/cart`);

    const [record] = await h.store.list("payment_transactions");
    expect(record.amount).toBe(136.5);
    expect(record.cart_checkout).toBe(true);
    expect((await h.store.get("carts", buyer.user.id))?.items).toEqual([]);

    const empty = await createCartCheckout(
      jsonRequest("/api/payments/create-checkout-cart", "POST", { origin_url: ORIGIN }, buyer.token),
      none
    );
    expect(empty.status).toBe(400);
    expect((await empty.json()).error).toBe("cart_empty");
  });

  it("releases funds after confirmed delivery and the hold period", async () => {
    const txId = await paidTransaction();
    const confirmed = await confirmDelivery(buyer.user, txId, { confirmation_type: "delivered", notes: "All good" });
    expect(confirmed.delivery_status).toBe("confirmed");
    const releaseAt = confirmed.auto_release_at;
    if (!releaseAt) throw new Error("auto_release_at not set");
    expect(Date.parse(releaseAt) - Date.parse(confirmed.delivery_confirmed_at ?? "")).toBe(3 * DAY_MS);

    await expect(releaseFunds(txId)).rejects.toMatchObject({ status: 400, code: "release_period_active" });

    const later = new Date(Date.parse(releaseAt) + DAY_MS);
    const sweep = await releaseDueFunds(later);
    expect(sweep).toEqual({ released: [txId], failed: [] });

    const tx = await h.store.get("transactions", txId);
    expect(tx?.status).toBe("completed");
    expect(tx?.completed_at).toBe(later.toISOString());

    const updatedBuyer = await h.store.get("users", buyer.user.id);
    expect(updatedBuyer?.completed_transactions).toBe(1);
    expect(updatedBuyer?.trust_score).toBe(52);
    expect(await h.store.count("invoices")).toBe(1);
    expect(h.mailer.sent.at(-1)?.subject).toBe("Betaling Ontvangen - Oak dining table");
  });

  it("lets only the buyer confirm delivery", async () => {
    const txId = await paidTransaction();
    await expect(confirmDelivery(seller.user, txId, { confirmation_type: "delivered" })).rejects.toMatchObject({
      status: 403
    });
  });

  it("blocks release of disputed transactions and alerts admins", async () => {
    const admin = await createUser({ is_admin: true });
    const txId = await paidTransaction();
    await confirmDelivery(buyer.user, txId, { confirmation_type: "dispute", notes: "Arrived broken" });

    await expect(releaseFunds(txId, { force: true })).rejects.toMatchObject({ status: 409, code: "transaction_disputed" });
    const adminNotes = await h.store.list("notifications", { where: [["user_id", "==", admin.user.id]] });
    expect(adminNotes.map((n) => n.title)).toEqual(["Delivery disputed"]);
  });

  it("requires delivery confirmation before release", async () => {
    const txId = await paidTransaction();
    await expect(releaseFunds(txId, { force: true })).rejects.toMatchObject({ code: "delivery_not_confirmed" });
  });

  it("skips the hold period only for admins", async () => {
    const admin = await createUser({ is_admin: true });
    const txId = await paidTransaction();
    await confirmDelivery(buyer.user, txId, { confirmation_type: "delivered" });

    const byCron = await releaseRoute(
      jsonRequest(`/api/transactions/${txId}/release-funds?secret=test-cron-secret`, "POST", { force: true }),
      { params: { id: txId } }
    );
    expect(byCron.status).toBe(400);
    expect((await byCron.json()).error).toBe("release_period_active");

    const byAdmin = await releaseRoute(
      jsonRequest(`/api/transactions/${txId}/release-funds`, "POST", { force: true }, admin.token),
      { params: { id: txId } }
    );
    expect(byAdmin.status).toBe(200);
    expect((await byAdmin.json()).transaction.status).toBe("completed");
  });

  it("refunds held transactions through the gateway and relists the item", async () => {
    const txId = await paidTransaction();
    const result = await cancelTransaction(buyer.user, txId);

    expect(result.refund_amount).toBe(105);
    expect(result.transaction.status).toBe("refunded");
    expect(h.gateway.refunds).toEqual([{ paymentIntentId: "pi_test_1", amountCents: 10500 }]);
    expect((await h.store.get("products", listing.id))?.is_sold).toBe(false);

    const [invoice] = await h.store.list("invoices");
    expect(invoice.invoice_status).toBe("refunded");
    const [record] = await h.store.list("payment_transactions");
    expect(record.payment_status).toBe("refunded");
    expect((await h.store.get("users", buyer.user.id))?.cancelled_transactions).toBe(1);
    expect(h.mailer.sent.at(-1)?.subject).toBe("Terugbetaling Verwerkt - Secondhand Market");
  });

  it("cancels pending transactions without a gateway refund", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    await cancelTransaction(seller.user, checkout.transaction_ids[0]);
    expect(h.gateway.refunds).toEqual([]);
    expect(h.gateway.session(checkout.session_id).status.status).toBe("expired");
    await expect(cancelTransaction(buyer.user, checkout.transaction_ids[0])).rejects.toMatchObject({
      code: "not_cancellable"
    });
  });

  it("refunds a payment that lands after the pending checkout was cancelled", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    const [txId] = checkout.transaction_ids;
    await cancelTransaction(buyer.user, txId);
    h.gateway.pay(checkout.session_id, "pi_late");

    const res = await checkoutStatusRoute(
      jsonRequest(`/api/payments/checkout-status/${checkout.session_id}`, "GET", undefined, buyer.token),
      { params: { sessionId: checkout.session_id } }
    );
    expect(await res.json()).toEqual({
      ok: true,
      status: "complete",
      payment_status: "refunded",
      amount_total: 10500,
      currency: "eur",
      transaction_ids: [txId]
    });
    expect(h.gateway.refunds).toEqual([{ paymentIntentId: "pi_late", amountCents: 10500 }]);
    expect(await h.store.get("transactions", txId)).toMatchObject({ status: "refunded", payment_intent_id: "pi_late" });
    expect((await h.store.get("products", listing.id))?.is_sold).toBe(false);
    expect(await h.store.count("invoices")).toBe(0);
  });

  it("refunds through the gateway when the checkout was paid before the cancel arrived", async () => {
    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    h.gateway.pay(checkout.session_id);

    const result = await cancelTransaction(buyer.user, checkout.transaction_ids[0]);
    expect(result.transaction.status).toBe("refunded");
    expect(h.gateway.refunds).toEqual([{ paymentIntentId: "pi_test_1", amountCents: 10500 }]);
    expect((await h.store.get("products", listing.id))?.is_sold).toBe(false);
    const [record] = await h.store.list("payment_transactions");
    expect(record.payment_status).toBe("refunded");
  });

  it("runs the release cron with the secret as a bearer token", async () => {
    const res = await cronRelease(jsonRequest("/api/cron/release-funds", "GET", undefined, "test-cron-secret"), none);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, released: [], failed: [] });

    const denied = await cronRelease(jsonRequest("/api/cron/release-funds", "GET", undefined, "wrong-secret"), none);
    expect(denied.status).toBe(401);
  });

  it("keeps strangers out of other people's transactions", async () => {
    const stranger = await createUser();
    const txId = await paidTransaction();
    await expect(cancelTransaction(stranger.user, txId)).rejects.toMatchObject({ status: 403, code: "forbidden" });
  });
});

describe("concurrent reconciliation", () => {
  it("applies a paid session once when the webhook and a status poll race", async () => {
    const h = installFakes();
    const store = new LaggingStore();
    setStore(store);
    const seller = await createUser({ name: "Sam Seller" });
    const buyer = await createUser({ name: "Bo Buyer" });
    const listing = await createListing(seller.user);

    const checkout = await checkoutProduct(buyer.user, listing.id, ORIGIN);
    const paid = h.gateway.pay(checkout.session_id);
    const [, poll] = await Promise.all([
      reconcileSession(paid),
      checkoutStatusRoute(
        jsonRequest(`/api/payments/checkout-status/${checkout.session_id}`, "GET", undefined, buyer.token),
        { params: { sessionId: checkout.session_id } }
      ),
      reconcileSession(paid)
    ]);

    expect((await poll.json()).payment_status).toBe("paid");
    expect(await store.count("invoices")).toBe(1);
    expect(h.mailer.sent.map((m) => m.to)).toEqual([buyer.user.email, seller.user.email]);
    expect(await store.count("notifications", [["user_id", "==", seller.user.id]])).toBe(1);
    expect((await store.get("transactions", checkout.transaction_ids[0]))?.status).toBe("held");
  });
});
