import { config } from "./config";
import { sendEmail } from "./email/mailer";
import { ApiError } from "./http";
import { issueInvoice, markInvoiceRefunded } from "./invoices";
import { computeCharge, CURRENCY, fromCents, toCents } from "./money";
import { notify, notifyAdmins } from "./notifications";
import { getPaymentGateway, sessionState, type SessionState, type SessionStatus } from "./payments";
import { getMany, getStore } from "./store";
import { addDays, newId, nowIso } from "./time";
import { refreshTrustScore } from "./trust";
import type { PaymentRecord, Product, Transaction, User } from "./types";

export type CheckoutResult = {
  checkout_url: string;
  session_id: string;
  transaction_ids: string[];
};

function originOf(originUrl: string): string {
  return originUrl.replace(/\/+$/, "");
}

async function startCheckout(
  buyer: User,
  products: Product[],
  originUrl: string,
  cartCheckout: boolean
): Promise<CheckoutResult> {
  const store = getStore();
  const origin = originOf(originUrl);
  const now = nowIso();

  const drafts = products.map((product) => ({ id: newId(), product, charge: computeCharge(product.price) }));
  const session = await getPaymentGateway().createCheckoutSession({
    lines: drafts.map((d) => ({ name: d.product.title, amount: d.charge.total_amount })),
    successUrl: `${origin}/payment-success?session_id={CHECKOUT_SESSION_ID}`,
    cancelUrl: cartCheckout ? `${origin}/cart` : `${origin}/browse`,
    metadata: {
      transaction_ids: drafts.map((d) => d.id).join(","),
      buyer_id: buyer.id,
      cart_checkout: String(cartCheckout)
    },
    customerEmail: buyer.email
  });

  for (const d of drafts) {
    const tx: Transaction = {
      id: d.id,
      product_id: d.product.id,
      buyer_id: buyer.id,
      seller_id: d.product.seller_id,
      ...d.charge,
      currency: CURRENCY,
      status: "pending",
      payment_provider: "stripe",
      payment_session_id: session.id,
      payment_intent_id: null,
      delivery_status: "pending",
      delivery_notes: null,
      delivery_confirmed_at: null,
      auto_release_at: null,
      cart_checkout: cartCheckout,
      created_at: now,
      paid_at: null,
      completed_at: null,
      cancelled_at: null,
      refunded_at: null
    };
    await store.create("transactions", tx);
  }

  const record: PaymentRecord = {
    id: newId(),
    session_id: session.id,
    transaction_ids: drafts.map((d) => d.id),
    buyer_id: buyer.id,
    amount: fromCents(drafts.reduce((sum, d) => sum + toCents(d.charge.total_amount), 0)),
    currency: CURRENCY,
    payment_status: "pending",
    payment_intent_id: null,
    cart_checkout: cartCheckout,
    created_at: now,
    updated_at: null
  };
  await store.create("payment_transactions", record);

  // eslint-disable-next-line no-console
  console.log("[payments] checkout session", session.id, "for", record.transaction_ids.length, "transaction(s)");
  return { checkout_url: session.url, session_id: session.id, transaction_ids: record.transaction_ids };
}

export async function checkoutProduct(buyer: User, productId: string, originUrl: string): Promise<CheckoutResult> {
  const product = await getStore().get("products", productId);
  if (!product || product.is_sold) throw new ApiError(404, "product_unavailable");
  if (product.seller_id === buyer.id) throw new ApiError(400, "own_product");
  return startCheckout(buyer, [product], originUrl, false);
}

export async function checkoutCart(buyer: User, originUrl: string): Promise<CheckoutResult> {
  const store = getStore();
  const cart = await store.get("carts", buyer.id);
  if (!cart || cart.items.length === 0) throw new ApiError(400, "cart_empty");

  const products = await getMany(store, "products", cart.items.map((i) => i.product_id));
  const available = [...products.values()].filter((p) => !p.is_sold);
  if (available.some((p) => p.seller_id === buyer.id)) throw new ApiError(400, "own_product");
  if (available.length === 0) throw new ApiError(404, "no_available_products");

  const result = await startCheckout(buyer, available, originUrl, true);
  await store.update("carts", buyer.id, { items: [], updated_at: nowIso() });
  return result;
}

export async function findPaymentRecord(sessionId: string): Promise<PaymentRecord | null> {
  const [record] = await getStore().list("payment_transactions", {
    where: [["session_id", "==", sessionId]],
    limit: 1
  });
  return record ?? null;
}

/** Returns a payment that arrived for a transaction cancelled while its checkout was open. */
async function refundLatePayment(tx: Transaction, paymentIntentId: string | null): Promise<void> {
  if (!paymentIntentId) {
    // eslint-disable-next-line no-console
    console.error("[payments] late payment without a payment intent for", tx.id);
    return;
  }
  await getPaymentGateway().refund(paymentIntentId, toCents(tx.total_amount));
  await getStore().update("transactions", tx.id, { payment_intent_id: paymentIntentId, refunded_at: nowIso() });
  // eslint-disable-next-line no-console
  console.log("[payments] refunded late payment for", tx.id);
}

type PaidOutcome = "held" | "refunded" | "skipped";

async function applyPaid(tx: Transaction, paymentIntentId: string | null): Promise<PaidOutcome> {
  const store = getStore();
  const now = nowIso();
  const claimed = await store.updateIf("transactions", tx.id, "status", "pending", {
    status: "held",
    paid_at: now,
    payment_intent_id: paymentIntentId
  });
  if (!claimed) {
    const current = await store.get("transactions", tx.id);
    if (current && (current.status === "cancelled" || current.status === "refunded")) {
      await refundLatePayment(current, paymentIntentId);
      return "refunded";
    }
    return "skipped";
  }
  const held: Transaction = { ...tx, status: "held", paid_at: now, payment_intent_id: paymentIntentId };

  await store.update("products", tx.product_id, { is_sold: true });
  const cart = await store.get("carts", tx.buyer_id);
  if (cart && cart.items.some((i) => i.product_id === tx.product_id)) {
    await store.update("carts", tx.buyer_id, {
      items: cart.items.filter((i) => i.product_id !== tx.product_id),
      updated_at: now
    });
  }

  await issueInvoice(held);

  const [buyer, seller, product] = await Promise.all([
    store.get("users", tx.buyer_id),
    store.get("users", tx.seller_id),
    store.get("products", tx.product_id)
  ]);
  const title = product?.title ?? "Product";
  if (buyer) {
    await sendEmail(buyer, {
      type: "order_confirmation",
      name: buyer.name,
      productTitle: title,
      orderId: tx.id,
      amount: tx.total_amount
    });
    await notify(buyer.id, {
      type: "order",
      title: "Payment received",
      message: `Your payment for "${title}" is held in escrow until you confirm delivery.`,
      link: "/orders"
    });
  }
  if (seller) {
    await sendEmail(seller, {
      type: "seller_notification",
      name: seller.name,
      buyerName: buyer?.name ?? "A buyer",
      productTitle: title,
      orderId: tx.id,
      amount: tx.amount
    });
    await notify(seller.id, {
      type: "sale",
      title: "Item sold",
      message: `"${title}" was sold. Arrange pickup or delivery with the buyer.`,
      link: "/orders"
    });
  }
  return "held";
}

/**
 * Folds a gateway status into the payment record and its transactions. The
 * record leaves `pending` through a conditional write, so of a webhook and a
 * status poll racing on the same session only one applies the outcome.
 */
export async function reconcilePayment(
  record: PaymentRecord,
  state: SessionState,
  paymentIntentId: string | null
): Promise<PaymentRecord> {
  if (state === "pending" || record.payment_status !== "pending") return record;
  const store = getStore();

  const patch: Partial<PaymentRecord> = { payment_status: state, updated_at: nowIso() };
  if (paymentIntentId) patch.payment_intent_id = paymentIntentId;
  if (!(await store.updateIf("payment_transactions", record.id, "payment_status", "pending", patch))) {
    return (await store.get("payment_transactions", record.id)) ?? record;
  }

  let refunded = 0;
  for (const id of record.transaction_ids) {
    const tx = await store.get("transactions", id);
    if (!tx) continue;
    if (state === "paid") {
      if ((await applyPaid(tx, paymentIntentId)) === "refunded") refunded += 1;
    } else {
      await store.updateIf("transactions", id, "status", "pending", { status: "cancelled", cancelled_at: nowIso() });
    }
  }
  if (refunded > 0 && refunded === record.transaction_ids.length) {
    patch.payment_status = "refunded";
    await store.update("payment_transactions", record.id, { payment_status: "refunded" });
  }
  // eslint-disable-next-line no-console
  console.log("[payments] session", record.session_id, "reconciled as", patch.payment_status);
  return { ...record, ...patch };
}

export async function reconcileSession(status: SessionStatus, state: SessionState = sessionState(status)): Promise<PaymentRecord | null> {
  const record = await findPaymentRecord(status.id);
  if (!record) {
    // eslint-disable-next-line no-console
    console.warn("[payments] no payment record for session", status.id);
    return null;
  }
  return reconcilePayment(record, state, status.payment_intent_id);
}

export async function checkoutStatus(user: User, sessionId: string) {
  const record = await findPaymentRecord(sessionId);
  if (!record) throw new ApiError(404, "payment_not_found");
  if (record.buyer_id !== user.id) throw new ApiError(403, "forbidden");

  const status = await getPaymentGateway().getSessionStatus(sessionId);
  const updated = await reconcilePayment(record, sessionState(status), status.payment_intent_id);
  return {
    status: status.status,
    payment_status: updated.payment_status,
    amount_total: status.amount_total,
    currency: status.currency,
    transaction_ids: record.transaction_ids
  };
}

async function loadTransaction(id: string): Promise<Transaction> {
  const tx = await getStore().get("transactions", id);
  if (!tx) throw new ApiError(404, "transaction_not_found");
  return tx;
}

export type DeliveryConfirmation = { confirmation_type: "delivered" | "dispute"; notes?: string };

export async function confirmDelivery(user: User, transactionId: string, input: DeliveryConfirmation): Promise<Transaction> {
  const store = getStore();
  const tx = await loadTransaction(transactionId);
  if (tx.buyer_id !== user.id) throw new ApiError(403, "forbidden");
  if (tx.status !== "held") throw new ApiError(400, "not_in_escrow");

  const now = nowIso();
  const product = await store.get("products", tx.product_id);
  const title = product?.title ?? "Product";

  if (input.confirmation_type === "delivered") {
    const patch: Partial<Transaction> = {
      delivery_status: "confirmed",
      delivery_confirmed_at: now,
      delivery_notes: input.notes ?? null,
      auto_release_at: addDays(now, config.autoReleaseDays)
    };
    await store.update("transactions", tx.id, patch);
    const seller = await store.get("users", tx.seller_id);
    if (seller) {
      await sendEmail(seller, { type: "delivery_confirmation", name: seller.name, productTitle: title, orderId: tx.id });
      await notify(seller.id, {
        type: "order",
        title: "Delivery confirmed",
        message: `The buyer confirmed delivery of "${title}".`,
        link: "/orders"
      });
    }
    return { ...tx, ...patch };
  }

  const patch: Partial<Transaction> = {
    delivery_status: "disputed",
    delivery_confirmed_at: now,
    delivery_notes: input.notes ?? null
  };
  await store.update("transactions", tx.id, patch);
  await notifyAdmins({
    type: "system",
    title: "Delivery disputed",
    message: `Transaction ${tx.id} for "${title}" was disputed by the buyer.`,
    link: `/admin/transactions/${tx.id}`
  });
  return { ...tx, ...patch };
}

export async function releaseFunds(transactionId: string, options: { force?: boolean; now?: Date } = {}): Promise<Transaction> {
  const store = getStore();
  const tx = await loadTransaction(transactionId);
  if (tx.status !== "held") throw new ApiError(400, "not_in_escrow");
  if (tx.delivery_status === "disputed") throw new ApiError(409, "transaction_disputed");
  if (tx.delivery_status !== "confirmed") throw new ApiError(400, "delivery_not_confirmed");

  const now = options.now ?? new Date();
  if (!options.force && tx.auto_release_at && now.toISOString() < tx.auto_release_at) {
    throw new ApiError(400, "release_period_active");
  }

  const completed_at = now.toISOString();
  if (!(await store.updateIf("transactions", tx.id, "status", "held", { status: "completed", completed_at }))) {
    throw new ApiError(400, "not_in_escrow");
  }
  const done: Transaction = { ...tx, status: "completed", completed_at };

  for (const userId of [tx.buyer_id, tx.seller_id]) {
    await store.increment("users", userId, "completed_transactions", 1);
    await refreshTrustScore(userId);
  }
  await issueInvoice(done);

  const [seller, product] = await Promise.all([store.get("users", tx.seller_id), store.get("products", tx.product_id)]);
  const title = product?.title ?? "Product";
  if (seller) {
    await sendEmail(seller, { type: "funds_released", name: seller.name, productTitle: title, amount: tx.amount });
    await notify(seller.id, {
      type: "sale",
      title: "Payment released",
      message: `The payment for "${title}" has been released to you.`,
      link: "/orders"
    });
  }
  // eslint-disable-next-line no-console
  console.log("[escrow] released", tx.id);
  return done;
}

export type ReleaseSweep = { released: string[]; failed: Array<{ id: string; error: string }> };

/** Releases every confirmed, undisputed escrow whose hold period has ended. */
export async function releaseDueFunds(now: Date = new Date()): Promise<ReleaseSweep> {
  const due = await getStore().list("transactions", {
    where: [
      ["status", "==", "held"],
      ["delivery_status", "==", "confirmed"],
      ["auto_release_at", "<=", now.toISOString()]
    ]
  });
  const sweep: ReleaseSweep = { released: [], failed: [] };
  for (const tx of due) {
    try {
      await releaseFunds(tx.id, { now });
      sweep.released.push(tx.id);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error("[escrow] release failed", tx.id, e);
      sweep.failed.push({ id: tx.id, error: e instanceof ApiError ? e.code : "server_error" });
    }
  }
  return sweep;
}

/**
 * Stops a pending checkout from being paid. A session that was paid in the
 * meantime is reconciled first, so the caller sees the transaction as held.
 */
async function closeCheckout(tx: Transaction): Promise<Transaction> {
  if (tx.status !== "pending" || !tx.payment_session_id) return tx;
  const gateway = getPaymentGateway();
  const status = await gateway.getSessionStatus(tx.payment_session_id);
  if (sessionState(status) === "paid") {
    await reconcileSession(status);
    return loadTransaction(tx.id);
  }
  if (status.status === "open") await gateway.expireSession(tx.payment_session_id);
  return tx;
}

export async function cancelTransaction(user: User, transactionId: string): Promise<{ transaction: Transaction; refund_amount: number }> {
  const store = getStore();
  const found = await loadTransaction(transactionId);
  if (found.buyer_id !== user.id && found.seller_id !== user.id) throw new ApiError(403, "forbidden");
  const tx = await closeCheckout(found);
  if (tx.status !== "pending" && tx.status !== "held") throw new ApiError(400, "not_cancellable");

  const refunded_at = nowIso();
  if (!(await store.updateIf("transactions", tx.id, "status", tx.status, { status: "refunded", refunded_at }))) {
    throw new ApiError(400, "not_cancellable");
  }

  const refund_amount = fromCents(toCents(tx.amount) + toCents(tx.commission));
  if (tx.status === "held" && tx.payment_intent_id) {
    try {
      await getPaymentGateway().refund(tx.payment_intent_id, toCents(refund_amount));
    } catch (e) {
      await store.update("transactions", tx.id, { status: "held", refunded_at: null });
      throw e;
    }
  }
  if (tx.status === "held") await store.update("products", tx.product_id, { is_sold: false });
  await markInvoiceRefunded(tx.id);

  // A pending checkout's record stays pending until the gateway reports the session closed.
  if (tx.status === "held" && tx.payment_session_id) {
    const record = await findPaymentRecord(tx.payment_session_id);
    if (record) {
      const siblings = await getMany(store, "transactions", record.transaction_ids);
      const settled = [...siblings.values()].every(
        (t) => t.id === tx.id || t.status === "refunded" || t.status === "cancelled"
      );
      if (settled) await store.update("payment_transactions", record.id, { payment_status: "refunded", updated_at: refunded_at });
    }
  }

  await store.increment("users", user.id, "cancelled_transactions", 1);
  await refreshTrustScore(user.id);

  const [buyer, product] = await Promise.all([store.get("users", tx.buyer_id), store.get("products", tx.product_id)]);
  if (buyer) {
    await sendEmail(buyer, { type: "refund", name: buyer.name, productTitle: product?.title ?? "Product", amount: refund_amount });
  }
  // eslint-disable-next-line no-console
  console.log("[escrow] cancelled", tx.id, "refund", refund_amount);
  return { transaction: { ...tx, status: "refunded", refunded_at }, refund_amount };
}
