import { config } from "../config";
import { formatEuro } from "../money";
import type { EmailType, Language } from "../types";

export type EmailInput =
  | { type: "welcome"; name: string }
  | { type: "order_confirmation"; name: string; productTitle: string; orderId: string; amount: number }
  | {
      type: "seller_notification";
      name: string;
      buyerName: string;
      productTitle: string;
      orderId: string;
      amount: number;
    }
  | { type: "delivery_confirmation"; name: string; productTitle: string; orderId: string }
  | { type: "cart_reminder"; name: string; items: string[] }
  | { type: "refund"; name: string; productTitle: string; amount: number }
  | { type: "funds_released"; name: string; productTitle: string; amount: number };

export type RenderedEmail = { type: EmailType; subject: string; html: string };

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

type Block = { heading: string; intro: string; details?: Array<[string, string]>; list?: string[]; cta?: { label: string; path: string } };

function layout(lang: Language, block: Block): string {
  const details = block.details?.length
    ? `<div style="background:#f8fafc;padding:20px;border-radius:12px;margin:20px 0;">${block.details
        .map(([k, v]) => `<strong>${k}:</strong> ${escapeHtml(v)}`)
        .join("<br>")}</div>`
    : "";
  const list = block.list?.length ? `<ul>${block.list.map((i) => `<li>${escapeHtml(i)}</li>`).join("")}</ul>` : "";
  const cta = block.cta
    ? `<p style="text-align:center;margin:30px 0;"><a href="${config.frontendUrl}${block.cta.path}" style="background:#6366f1;color:#fff;text-decoration:none;padding:14px 28px;border-radius:12px;font-weight:bold;">${block.cta.label}</a></p>`
    : "";
  const footer =
    lang === "en"
      ? `Questions? Contact ${escapeHtml(config.supportEmail)}`
      : `Vragen? Neem contact op via ${escapeHtml(config.supportEmail)}`;
  return [
    "<html><body style=\"font-family:Arial,sans-serif;max-width:600px;margin:0 auto;padding:20px;\">",
    `<h1 style="color:#1e293b;">${block.heading}</h1>`,
    `<p style="color:#64748b;line-height:1.6;">${block.intro}</p>`,
    details,
    list,
    cta,
    `<p style="color:#94a3b8;font-size:13px;text-align:center;">${escapeHtml(config.appName)} · ${footer}</p>`,
    "</body></html>"
  ].join("");
}

export function renderEmail(input: EmailInput, lang: Language = "nl"): RenderedEmail {
  const en = lang === "en";
  const name = escapeHtml(input.name);

  switch (input.type) {
    case "welcome":
      return {
        type: input.type,
        subject: en ? `🎉 Welcome to ${config.appName}!` : `🎉 Welkom bij ${config.appName}!`,
        html: layout(lang, {
          heading: en ? `Hi ${name}!` : `Hoi ${name}!`,
          intro: en
            ? "Your account is ready. List items you no longer need or find your next second-hand treasure."
            : "Je account is klaar. Zet spullen die je niet meer gebruikt te koop of vind je volgende tweedehands schat.",
          cta: { label: en ? "Start browsing" : "Begin met zoeken", path: "/" }
        })
      };
    case "order_confirmation":
      return {
        type: input.type,
        subject: en ? `🎉 Order Confirmed - ${input.productTitle}` : `🎉 Bestelling Bevestigd - ${input.productTitle}`,
        html: layout(lang, {
          heading: en ? `Hi ${name}!` : `Hoi ${name}!`,
          intro: en
            ? "Your payment was received and is held in escrow until you confirm delivery."
            : "Je betaling is ontvangen en wordt vastgehouden tot je de levering bevestigt.",
          details: [
            [en ? "Product" : "Product", input.productTitle],
            [en ? "Order ID" : "Bestelnummer", input.orderId],
            [en ? "Amount" : "Bedrag", formatEuro(input.amount)]
          ],
          cta: { label: en ? "View order" : "Bekijk bestelling", path: "/orders" }
        })
      };
    case "seller_notification":
      return {
        type: input.type,
        subject: en ? `💰 New Sale - ${input.productTitle}` : `💰 Nieuwe Verkoop - ${input.productTitle}`,
        html: layout(lang, {
          heading: en ? `Congratulations ${name}!` : `Gefeliciteerd ${name}!`,
          intro: en
            ? "Your item was sold. The payment is held until the buyer confirms delivery."
            : "Je artikel is verkocht. De betaling wordt vastgehouden tot de koper de levering bevestigt.",
          details: [
            [en ? "Product" : "Product", input.productTitle],
            [en ? "Buyer" : "Koper", input.buyerName],
            [en ? "Order ID" : "Bestelnummer", input.orderId],
            [en ? "Amount" : "Bedrag", formatEuro(input.amount)]
          ],
          cta: { label: en ? "Message buyer" : "Stuur de koper een bericht", path: "/messages" }
        })
      };
    case "delivery_confirmation":
      return {
        type: input.type,
        subject: en ? `✅ Delivery Confirmed - ${input.productTitle}` : `✅ Levering Bevestigd - ${input.productTitle}`,
        html: layout(lang, {
          heading: en ? `Hi ${name}!` : `Hoi ${name}!`,
          intro: en
            ? `The buyer confirmed delivery. Funds are released after ${config.autoReleaseDays} days.`
            : `De koper heeft de levering bevestigd. Het geld wordt na ${config.autoReleaseDays} dagen vrijgegeven.`,
          details: [
            [en ? "Product" : "Product", input.productTitle],
            [en ? "Order ID" : "Bestelnummer", input.orderId]
          ]
        })
      };
    case "cart_reminder":
      return {
        type: input.type,
        subject: en
          ? "🛒 Don't forget your treasures - Complete your purchase!"
          : "🛒 Vergeet je schatten niet - Voltooi je aankoop!",
        html: layout(lang, {
          heading: en ? `Hi ${name}!` : `Hoi ${name}!`,
          intro: en
            ? "You left these items in your cart. Second-hand items are one of a kind, so they may not wait for long."
            : "Deze artikelen liggen nog in je winkelwagen. Tweedehands artikelen zijn uniek, dus wacht niet te lang.",
          list: input.items,
          cta: { label: en ? "Go to cart" : "Naar winkelwagen", path: "/cart" }
        })
      };
    case "refund":
      return {
        type: input.type,
        subject: en ? `Refund Processed - ${config.appName}` : `Terugbetaling Verwerkt - ${config.appName}`,
        html: layout(lang, {
          heading: en ? `Hi ${name}` : `Hoi ${name}`,
          intro: en
            ? "Your order was cancelled and the payment has been refunded."
            : "Je bestelling is geannuleerd en de betaling is terugbetaald.",
          details: [
            [en ? "Product" : "Product", input.productTitle],
            [en ? "Refund" : "Terugbetaling", formatEuro(input.amount)]
          ]
        })
      };
    case "funds_released":
      return {
        type: input.type,
        subject: en ? `Payment Received - ${input.productTitle}` : `Betaling Ontvangen - ${input.productTitle}`,
        html: layout(lang, {
          heading: en ? `Hi ${name}!` : `Hoi ${name}!`,
          intro: en ? "The escrow period ended and your payment has been released." : "De betaling is vrijgegeven.",
          details: [
            [en ? "Product" : "Product", input.productTitle],
            [en ? "Amount" : "Bedrag", formatEuro(input.amount)]
          ]
        })
      };
  }
}
