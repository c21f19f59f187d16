import PDFDocument from "pdfkit";
import { config } from "./config";
import { ApiError } from "./http";
import { computeVat, formatEuro } from "./money";
import { getBlobStore } from "./storage";
import { getStore } from "./store";
import { nowIso } from "./time";
import type { Invoice, Transaction, User } from "./types";

export function formatInvoiceNumber(year: number, sequence: number): string {
  return `INV-${year}-${String(sequence).padStart(5, "0")}`;
}

export async function nextInvoiceNumber(now: Date = new Date()): Promise<string> {
  const year = now.getUTCFullYear();
  const seq = await getStore().nextSequence(`invoices-${year}`);
  return formatInvoiceNumber(year, seq);
}

export async function findInvoiceForTransaction(transactionId: string): Promise<Invoice | null> {
  const [invoice] = await getStore().list("invoices", { where: [["transaction_id", "==", transactionId]], limit: 1 });
  return invoice ?? null;
}

/**
 * Issues the paid invoice for a transaction; an existing one is returned unchanged.
 * The invoice is keyed by the transaction id, so concurrent callers agree on one.
 */
export async function issueInvoice(tx: Transaction): Promise<Invoice> {
  const existing = await findInvoiceForTransaction(tx.id);
  if (existing) return existing;

  const now = nowIso();
  const invoice: Invoice = {
    id: tx.id,
    invoice_number: await nextInvoiceNumber(),
    transaction_id: tx.id,
    buyer_id: tx.buyer_id,
    seller_id: tx.seller_id,
    product_id: tx.product_id,
    invoice_date: now,
    amount: tx.amount,
    commission: tx.commission,
    vat_amount: computeVat(tx.total_amount),
    vat_rate: config.vatRate,
    total_amount: tx.total_amount,
    payment_method: "stripe",
    payment_status: "paid",
    invoice_status: "paid",
    pdf_url: null,
    created_at: now,
    updated_at: now
  };
  if (!(await getStore().createIfAbsent("invoices", invoice))) {
    const winner = await getStore().get("invoices", tx.id);
    if (winner) return winner;
    throw new ApiError(409, "invoice_conflict");
  }
  // eslint-disable-next-line no-console
  console.log("[invoices] issued", invoice.invoice_number, "for transaction", tx.id);
  return invoice;
}

export async function markInvoiceRefunded(transactionId: string): Promise<void> {
  const invoice = await findInvoiceForTransaction(transactionId);
  if (!invoice) return;
  await getStore().update("invoices", invoice.id, {
    payment_status: "refunded",
    invoice_status: "refunded",
    updated_at: nowIso()
  });
}

type Party = Pick<User, "name" | "email" | "phone">;

export type InvoiceDocument = {
  invoice: Invoice;
  buyer: Party;
  seller: Party;
  productTitle: string;
};

function longDate(iso: string): string {
  return new Date(iso).toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric", timeZone: "UTC" });
}

export function renderInvoicePdf({ invoice, buyer, seller, productTitle }: InvoiceDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "A4", margin: 50, info: { Title: invoice.invoice_number } });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.fillColor("#2563eb").font("Helvetica-Bold").fontSize(24).text("INVOICE");
    doc.moveDown();

    doc.fillColor("#374151").fontSize(10);
    const info: Array<[string, string]> = [
      ["Invoice Number:", invoice.invoice_number],
      ["Invoice Date:", longDate(invoice.invoice_date)],
      ["Transaction ID:", `${invoice.transaction_id.slice(0, 12)}...`],
      ["Payment Status:", invoice.payment_status.toUpperCase()]
    ];
    for (const [label, value] of info) {
      doc.font("Helvetica-Bold").text(label, { continued: true }).font("Helvetica").text(` ${value}`);
    }
    doc.moveDown();

    const top = doc.y;
    doc.font("Helvetica-Bold").fontSize(11).fillColor("#1f2937");
    doc.text("BILL TO:", 50, top);
    doc.text("SELLER:", 300, top);
    doc.font("Helvetica").fontSize(9).fillColor("#6b7280");
    doc.text([buyer.name, buyer.email, buyer.phone || "N/A"].join("\n"), 50, top + 16);
    doc.text([seller.name, seller.email, seller.phone || "N/A"].join("\n"), 300, top + 16);
    doc.x = 50;
    doc.moveDown(2);

    doc.font("Helvetica-Bold").fontSize(14).fillColor("#1f2937").text("ITEMS");
    doc.font("Helvetica").fontSize(10);
    doc.text(`${productTitle}  x1  ${formatEuro(invoice.amount)}`);
    doc.moveDown();

    const pct = (rate: number) => `${Math.round(rate * 100)}%`;
    const totals: Array<[string, string]> = [
      ["Subtotal:", formatEuro(invoice.amount)],
      [`Platform Commission (${pct(config.commissionRate)}):`, formatEuro(invoice.commission)],
      [`VAT (${pct(invoice.vat_rate)}):`, formatEuro(invoice.vat_amount)]
    ];
    for (const [label, value] of totals) doc.text(`${label} ${value}`, { align: "right" });
    doc.font("Helvetica-Bold").fontSize(12).text(`TOTAL: ${formatEuro(invoice.total_amount)}`, { align: "right" });
    doc.moveDown(2);

    doc.font("Helvetica").fontSize(9).fillColor("#6b7280");
    doc.text(`Payment Method: ${invoice.payment_method.toUpperCase()}`);
    doc.text(`Payment Date: ${longDate(invoice.invoice_date)}`);
    doc.moveDown(2);

    doc.fontSize(8).fillColor("#9ca3af");
    doc.text(`Thank you for using ${config.appName}!`, { align: "center" });
    doc.text(`For support, contact us at ${config.supportEmail}`, { align: "center" });
    doc.end();
  });
}

/** Renders and uploads the invoice PDF on first request; later calls reuse the stored URL. */
export async function ensureInvoicePdf(invoice: Invoice): Promise<string> {
  if (invoice.pdf_url) return invoice.pdf_url;
  const store = getStore();
  const [buyer, seller, product] = await Promise.all([
    store.get("users", invoice.buyer_id),
    store.get("users", invoice.seller_id),
    store.get("products", invoice.product_id)
  ]);
  if (!buyer || !seller) throw new ApiError(404, "related_data_not_found");

  const pdf = await renderInvoicePdf({ invoice, buyer, seller, productTitle: product?.title ?? "Product" });
  const objectName = `invoices/invoice_${invoice.invoice_number.replace(/-/g, "_")}.pdf`;
  const pdf_url = await getBlobStore().put(objectName, pdf, "application/pdf");
  await store.update("invoices", invoice.id, { pdf_url, updated_at: nowIso() });
  return pdf_url;
}

/** Parties to the sale and admins may read an invoice. */
export async function invoiceForViewer(user: User, invoiceId: string): Promise<Invoice> {
  const invoice = await getStore().get("invoices", invoiceId);
  if (!invoice) throw new ApiError(404, "invoice_not_found");
  if (!user.is_admin && invoice.buyer_id !== user.id && invoice.seller_id !== user.id) {
    throw new ApiError(403, "forbidden");
  }
  return invoice;
}
