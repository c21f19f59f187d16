import { z } from "zod";
import { CATEGORIES } from "./catalog";
import type { HistoryFilters } from "./history";
import { parseDateParam } from "./time";
import { CONDITIONS } from "./types";

const language = z.enum(["nl", "en"]);
const optionalText = z.string().trim().optional().nullable();

export const registerSchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(6),
    name: z.string().trim().min(2),
    phone: optionalText,
    profile_image: optionalText,
    is_business_seller: z.boolean().default(false),
    business_name: optionalText,
    vat_number: optionalText,
    language: language.default("nl")
  })
  .superRefine((v, ctx) => {
    if (!v.is_business_seller) return;
    if (!v.business_name) ctx.addIssue({ code: "custom", path: ["business_name"], message: "Required for business sellers" });
    if (!v.vat_number) ctx.addIssue({ code: "custom", path: ["vat_number"], message: "Required for business sellers" });
  });

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1)
});

export const profileUpdateSchema = z.object({
  name: z.string().trim().min(2).optional(),
  phone: z.string().trim().nullable().optional(),
  profile_image: z.string().trim().nullable().optional(),
  language: language.optional()
});

export const productCreateSchema = z.object({
  title: z.string().trim().min(3).max(200),
  description: z.string().trim().min(10),
  price: z.number().positive(),
  category: z.enum(CATEGORIES),
  condition: z.enum(CONDITIONS),
  images: z.array(z.string()).default([]),
  pickup_address: z.string().trim().min(1),
  pickup_coordinates: z.object({ lat: z.number().min(-90).max(90), lng: z.number().min(-180).max(180) }).optional(),
  is_featured: z.boolean().default(false)
});

export const ratingCreateSchema = z.object({
  rated_user_id: z.string().min(1),
  transaction_id: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(500).optional().nullable()
});

export const reviewCreateSchema = z.object({
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(1000).optional().nullable()
});

export const cartAddSchema = z.object({ product_id: z.string().min(1) });

export const checkoutSchema = z.object({
  product_id: z.string().min(1),
  origin_url: z.string().url()
});

export const cartCheckoutSchema = z.object({ origin_url: z.string().url() });

export const deliveryConfirmationSchema = z.object({
  confirmation_type: z.enum(["delivered", "dispute"]),
  notes: z.string().max(1000).optional()
});

export const releaseSchema = z.object({ force: z.boolean().default(false) });

export const attachmentSchema = z.object({
  type: z.enum(["image", "file"]),
  url: z.string().min(1),
  name: z.string(),
  size: z.number().int().min(0)
});

export const conversationCreateSchema = z.object({
  product_id: z.string().min(1),
  recipient_id: z.string().min(1),
  initial_message: z.string().trim().min(1).max(1000)
});

export const messageCreateSchema = z
  .object({
    content: z.string().max(1000).default(""),
    attachments: z.array(attachmentSchema).max(10).default([])
  })
  .refine((v) => v.content.trim().length > 0 || v.attachments.length > 0, {
    message: "content or attachment required",
    path: ["content"]
  });

export const typingSchema = z.object({ is_typing: z.boolean() });

const notificationToggles = z.object({
  order: z.boolean(),
  message: z.boolean(),
  review: z.boolean(),
  support: z.boolean(),
  system: z.boolean(),
  sale: z.boolean(),
  favorite: z.boolean(),
  price_drop: z.boolean()
});

const clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/);

export const preferencesUpdateSchema = z.object({
  email_notifications: z.boolean().optional(),
  notification_types: notificationToggles.partial().optional(),
  quiet_hours: z.object({ enabled: z.boolean(), start: clock, end: clock }).optional(),
  digest_enabled: z.boolean().optional(),
  digest_frequency: z.enum(["daily", "weekly"]).optional(),
  sound_enabled: z.boolean().optional()
});

export const ticketCreateSchema = z.object({
  subject: z.string().trim().min(3).max(200),
  message: z.string().trim().min(10).max(2000),
  category: z.enum(["account", "payment", "product", "technical", "other"]).default("other"),
  priority: z.enum(["low", "medium", "high", "urgent"]).default("medium")
});

export const ticketReplySchema = z.object({ message: z.string().trim().min(1).max(2000) });

export const ticketStatusSchema = z.object({ status: z.enum(["open", "in_progress", "resolved", "closed"]) });

export const reportCreateSchema = z.object({
  reported_type: z.enum(["user", "product", "message"]),
  reported_id: z.string().min(1),
  reason: z.string().trim().min(1).max(100),
  description: z.string().trim().min(10).max(500)
});

export const reportResolveSchema = z.object({
  action: z.enum(["dismiss", "warn", "ban"]),
  notes: z.string().max(1000).optional()
});

export const verificationRequestSchema = z.object({ documents: z.array(z.string()).max(10).default([]) });

export const verificationDecisionSchema = z.object({
  approved: z.boolean(),
  notes: z.string().max(1000).optional()
});

export const featureSchema = z.object({ featured: z.boolean() });

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Reads status, start_date, end_date and the role parameter. A date-only
 * end_date covers that whole day.
 */
export function historyFilters(params: URLSearchParams, roleParam: "role" | "transaction_type"): HistoryFilters {
  const role = params.get(roleParam);
  const rawEnd = params.get("end_date");
  const end = parseDateParam(rawEnd && DATE_ONLY.test(rawEnd) ? `${rawEnd}T23:59:59.999Z` : rawEnd);
  return {
    status: params.get("status") || null,
    start: parseDateParam(params.get("start_date")),
    end,
    role: role === "buyer" || role === "seller" ? role : null
  };
}
