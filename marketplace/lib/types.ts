// Stored documents. Timestamps are ISO-8601 UTC strings so range filters
// compare lexicographically in every store.

export type Language = "nl" | "en";

export type User = {
  id: string;
  email: string;
  name: string;
  hashed_password: string;
  phone: string | null;
  profile_image: string | null;
  language: Language;
  is_business_seller: boolean;
  business_name: string | null;
  vat_number: string | null;
  is_admin: boolean;
  is_banned: boolean;
  is_verified: boolean;
  verification_requested: boolean;
  verification_requested_at: string | null;
  trust_score: number;
  completed_transactions: number;
  cancelled_transactions: number;
  reports_received: number;
  rating_average: number;
  rating_count: number;
  is_featured_seller: boolean;
  created_at: string;
  last_login_at: string | null;
};

export type PublicUser = Omit<User, "hashed_password">;

export const CONDITIONS = ["excellent", "good", "fair", "poor"] as const;
export type Condition = (typeof CONDITIONS)[number];

export type Coordinates = { lat: number; lng: number };

export type Product = {
  id: string;
  title: string;
  description: string;
  price: number;
  category: string;
  condition: Condition;
  images: string[];
  pickup_address: string;
  pickup_location: { address: string; coordinates: Coordinates };
  seller_id: string;
  seller_name: string;
  is_sold: boolean;
  is_featured: boolean;
  views: number;
  created_at: string;
};

export type CartItem = { product_id: string; quantity: number; added_at: string };

export type Cart = {
  id: string;
  user_id: string;
  items: CartItem[];
  reminder_sent: boolean;
  created_at: string;
  updated_at: string;
};

export type Wishlist = {
  id: string;
  user_id: string;
  product_ids: string[];
  created_at: string;
  updated_at: string;
};

export type TransactionStatus = "pending" | "held" | "completed" | "cancelled" | "refunded";
export type DeliveryStatus = "pending" | "confirmed" | "disputed";

export type Transaction = {
  id: string;
  product_id: string;
  buyer_id: string;
  seller_id: string;
  amount: number;
  commission: number;
  commission_rate: number;
  total_amount: number;
  currency: string;
  status: TransactionStatus;
  payment_provider: "stripe";
  payment_session_id: string | null;
  payment_intent_id: string | null;
  delivery_status: DeliveryStatus;
  delivery_notes: string | null;
  delivery_confirmed_at: string | null;
  auto_release_at: string | null;
  cart_checkout: boolean;
  created_at: string;
  paid_at: string | null;
  completed_at: string | null;
  cancelled_at: string | null;
  refunded_at: string | null;
};

export type PaymentStatus = "pending" | "paid" | "failed" | "expired" | "refunded";

export type PaymentRecord = {
  id: string;
  session_id: string;
  transaction_ids: string[];
  buyer_id: string;
  amount: number;
  currency: string;
  payment_status: PaymentStatus;
  payment_intent_id: string | null;
  cart_checkout: boolean;
  created_at: string;
  updated_at: string | null;
};

export type InvoiceStatus = "issued" | "paid" | "cancelled" | "refunded";

export type Invoice = {
  id: string;
  invoice_number: string;
  transaction_id: string;
  buyer_id: string;
  seller_id: string;
  product_id: string;
  invoice_date: string;
  amount: number;
  commission: number;
  vat_amount: number;
  vat_rate: number;
  total_amount: number;
  payment_method: "stripe";
  payment_status: "paid" | "pending" | "refunded";
  invoice_status: InvoiceStatus;
  pdf_url: string | null;
  created_at: string;
  updated_at: string;
};

export type Conversation = {
  id: string;
  product_id: string;
  buyer_id: string;
  seller_id: string;
  participants: string[];
  last_message: string;
  last_message_at: string | null;
  buyer_unread_count: number;
  seller_unread_count: number;
  buyer_typing: boolean;
  seller_typing: boolean;
  buyer_typing_at: string | null;
  seller_typing_at: string | null;
  created_at: string;
  updated_at: string;
};

export type Attachment = { type: "image" | "file"; url: string; name: string; size: number };

export type Message = {
  id: string;
  conversation_id: string;
  sender_id: string;
  message: string;
  attachments: Attachment[];
  read: boolean;
  read_at: string | null;
  created_at: string;
};

export const NOTIFICATION_TYPES = [
  "order",
  "message",
  "review",
  "support",
  "system",
  "sale",
  "favorite",
  "price_drop"
] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type Notification = {
  id: string;
  user_id: string;
  type: NotificationType;
  title: string;
  message: string;
  link: string | null;
  icon: string;
  read: boolean;
  created_at: string;
};

export type NotificationPreferences = {
  id: string;
  user_id: string;
  email_notifications: boolean;
  notification_types: Record<NotificationType, boolean>;
  quiet_hours: { enabled: boolean; start: string; end: string };
  digest_enabled: boolean;
  digest_frequency: "daily" | "weekly";
  sound_enabled: boolean;
};

export type Rating = {
  id: string;
  rater_id: string;
  rated_user_id: string;
  transaction_id: string;
  rating: number;
  comment: string | null;
  created_at: string;
};

export type Review = {
  id: string;
  product_id: string;
  user_id: string;
  seller_id: string;
  rating: number;
  comment: string | null;
  created_at: string;
};

export type ReportedType = "user" | "product" | "message";

export type Report = {
  id: string;
  reporter_id: string;
  reported_type: ReportedType;
  reported_id: string;
  reason: string;
  description: string;
  status: "pending" | "reviewed" | "resolved" | "dismissed";
  admin_action: "dismiss" | "warn" | "ban" | null;
  admin_notes: string | null;
  resolved_by: string | null;
  resolved_at: string | null;
  created_at: string;
};

export type VerificationRequest = {
  id: string;
  user_id: string;
  documents: string[];
  email_verified: boolean;
  phone_verified: boolean;
  status: "pending" | "approved" | "rejected";
  admin_notes: string | null;
  reviewed_by: string | null;
  reviewed_at: string | null;
  created_at: string;
};

export type TicketStatus = "open" | "in_progress" | "resolved" | "closed";

export type Ticket = {
  id: string;
  user_id: string;
  subject: string;
  message: string;
  category: "account" | "payment" | "product" | "technical" | "other";
  priority: "low" | "medium" | "high" | "urgent";
  status: TicketStatus;
  created_at: string;
  updated_at: string;
};

export type TicketReply = {
  id: string;
  ticket_id: string;
  user_id: string;
  message: string;
  is_staff: boolean;
  created_at: string;
};

export type EmailType =
  | "welcome"
  | "order_confirmation"
  | "seller_notification"
  | "delivery_confirmation"
  | "cart_reminder"
  | "refund"
  | "funds_released";

export type EmailLog = {
  id: string;
  user_id: string;
  email_type: EmailType;
  recipient_email: string;
  subject: string;
  status: "sent" | "failed";
  error_message: string | null;
  sent_at: string | null;
  created_at: string;
};

export type Counter = { id: string; value: number };

export interface Collections {
  users: User;
  products: Product;
  carts: Cart;
  wishlists: Wishlist;
  transactions: Transaction;
  payment_transactions: PaymentRecord;
  invoices: Invoice;
  conversations: Conversation;
  messages: Message;
  notifications: Notification;
  notification_preferences: NotificationPreferences;
  ratings: Rating;
  reviews: Review;
  reports: Report;
  verification_requests: VerificationRequest;
  support_tickets: Ticket;
  support_ticket_replies: TicketReply;
  email_logs: EmailLog;
  counters: Counter;
}

export type CollectionName = keyof Collections;
