import { getMany, getStore } from "./store";
import type { Invoice, Transaction } from "./types";

export type Role = "buyer" | "seller";

export type HistoryFilters = {
  status?: string | null;
  start?: string | null;
  end?: string | null;
  role?: Role | null;
};

type PartyDoc = { id: string; buyer_id: string; seller_id: string };

// Firestore has no OR across fields, so buyer and seller sides are read separately.
async function bothSides<T extends PartyDoc>(
  load: (field: "buyer_id" | "seller_id") => Promise<T[]>,
  role?: Role | null
): Promise<T[]> {
  const byId = new Map<string, T>();
  if (role !== "seller") for (const doc of await load("buyer_id")) byId.set(doc.id, doc);
  if (role !== "buyer") for (const doc of await load("seller_id")) byId.set(doc.id, doc);
  return [...byId.values()];
}

function inRange(value: string, start?: string | null, end?: string | null): boolean {
  if (start && value < start) return false;
  if (end && value > end) return false;
  return true;
}

function partyNames(docs: PartyDoc[]) {
  return getMany(getStore(), "users", docs.flatMap((d) => [d.buyer_id, d.seller_id]));
}

export type TransactionView = Transaction & {
  product_title: string;
  product_images: string[];
  product_category: string;
  buyer_name: string;
  seller_name: string;
  user_role: Role;
  has_invoice: boolean;
  invoice_id: string | null;
  invoice_number: string | null;
};

export async function transactionHistory(userId: string, filters: HistoryFilters = {}): Promise<TransactionView[]> {
  const store = getStore();
  const txs = (await bothSides((field) => store.list("transactions", { where: [[field, "==", userId]] }), filters.role))
    .filter((t) => !filters.status || t.status === filters.status)
    .filter((t) => inRange(t.created_at, filters.start, filters.end))
    .sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0));

  const products = await getMany(store, "products", txs.map((t) => t.product_id));
  const users = await partyNames(txs);
  const invoices = new Map<string, Invoice>();
  for (const t of txs) {
    const [invoice] = await store.list("invoices", { where: [["transaction_id", "==", t.id]], limit: 1 });
    if (invoice) invoices.set(t.id, invoice);
  }

  return txs.map((t): TransactionView => {
    const product = products.get(t.product_id);
    const invoice = invoices.get(t.id);
    return {
      ...t,
      product_title: product?.title ?? "Unknown Product",
      product_images: product?.images ?? [],
      product_category: product?.category ?? "Unknown",
      buyer_name: users.get(t.buyer_id)?.name ?? "Unknown Buyer",
      seller_name: users.get(t.seller_id)?.name ?? "Unknown Seller",
      user_role: t.buyer_id === userId ? "buyer" : "seller",
      has_invoice: invoice !== undefined,
      invoice_id: invoice?.id ?? null,
      invoice_number: invoice?.invoice_number ?? null
    };
  });
}

export type InvoiceView = Invoice & {
  product_title: string;
  buyer_name: string;
  seller_name: string;
  user_role?: Role;
};

async function enrichInvoices(invoices: Invoice[], viewerId?: string): Promise<InvoiceView[]> {
  const products = await getMany(getStore(), "products", invoices.map((i) => i.product_id));
  const users = await partyNames(invoices);
  return invoices.map((i): InvoiceView => ({
    ...i,
    product_title: products.get(i.product_id)?.title ?? "Unknown Product",
    buyer_name: users.get(i.buyer_id)?.name ?? "Unknown Buyer",
    seller_name: users.get(i.seller_id)?.name ?? "Unknown Seller",
    user_role: viewerId === undefined ? undefined : i.buyer_id === viewerId ? "buyer" : "seller"
  }));
}

const newestInvoiceFirst = (a: Invoice, b: Invoice) =>
  a.invoice_date < b.invoice_date ? 1 : a.invoice_date > b.invoice_date ? -1 : 0;

export async function userInvoices(userId: string, filters: HistoryFilters = {}): Promise<InvoiceView[]> {
  const store = getStore();
  const invoices = (await bothSides((field) => store.list("invoices", { where: [[field, "==", userId]] }), filters.role))
    .filter((i) => !filters.status || i.invoice_status === filters.status)
    .filter((i) => inRange(i.invoice_date, filters.start, filters.end))
    .sort(newestInvoiceFirst);
  return enrichInvoices(invoices, userId);
}

export async function allInvoices(): Promise<InvoiceView[]> {
  const invoices = await getStore().list("invoices", { orderBy: { field: "invoice_date", direction: "desc" } });
  return enrichInvoices(invoices);
}

export function isParty(doc: PartyDoc, userId: string): boolean {
  return doc.buyer_id === userId || doc.seller_id === userId;
}
