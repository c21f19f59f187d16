import { roundMoney } from "./money";
import { getStore } from "./store";

const DAY_MS = 86_400_000;

export type SellerDashboard = {
  total_products: number;
  active_products: number;
  sold_products: number;
  total_views: number;
  total_sales: number;
  total_revenue: number;
  total_commission: number;
  net_revenue: number;
  average_rating: number;
  total_reviews: number;
  active_conversations: number;
  recent_sales_30d: number;
  recent_views_30d: number;
};

export async function sellerDashboard(sellerId: string, now: Date = new Date()): Promise<SellerDashboard> {
  const store = getStore();
  const products = await store.list("products", { where: [["seller_id", "==", sellerId]] });
  const sales = await store.list("transactions", {
    where: [
      ["seller_id", "==", sellerId],
      ["status", "==", "completed"]
    ]
  });
  const reviews = await store.list("reviews", { where: [["seller_id", "==", sellerId]] });
  const conversations = await store.count("conversations", [["participants", "array-contains", sellerId]]);

  const since = new Date(now.getTime() - 30 * DAY_MS).toISOString();
  const active = products.filter((p) => !p.is_sold).length;
  // Revenue is the item price; commission is charged to the buyer on top.
  const revenue = sales.reduce((sum, t) => sum + t.amount, 0);
  const commission = sales.reduce((sum, t) => sum + t.commission, 0);
  const ratingSum = reviews.reduce((sum, r) => sum + r.rating, 0);

  return {
    total_products: products.length,
    active_products: active,
    sold_products: products.length - active,
    total_views: products.reduce((sum, p) => sum + p.views, 0),
    total_sales: sales.length,
    total_revenue: roundMoney(revenue),
    total_commission: roundMoney(commission),
    net_revenue: roundMoney(revenue - commission),
    average_rating: reviews.length ? Math.round((ratingSum / reviews.length) * 100) / 100 : 0,
    total_reviews: reviews.length,
    active_conversations: conversations,
    recent_sales_30d: sales.filter((t) => t.created_at > since).length,
    recent_views_30d: products.filter((p) => p.created_at > since).reduce((sum, p) => sum + p.views, 0)
  };
}

export type AdminStats = {
  total_users: number;
  total_products: number;
  total_transactions: number;
  total_tickets: number;
  total_revenue: number;
  pending_orders: number;
  held_in_escrow: number;
  open_tickets: number;
  pending_reports: number;
  pending_verifications: number;
  today: { users: number; products: number; transactions: number };
};

export async function adminStats(now: Date = new Date()): Promise<AdminStats> {
  const store = getStore();
  const midnight = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())).toISOString();
  const completed = await store.list("transactions", { where: [["status", "==", "completed"]] });

  return {
    total_users: await store.count("users"),
    total_products: await store.count("products"),
    total_transactions: await store.count("transactions"),
    total_tickets: await store.count("support_tickets"),
    total_revenue: roundMoney(completed.reduce((sum, t) => sum + t.commission, 0)),
    pending_orders: await store.count("transactions", [["status", "==", "pending"]]),
    held_in_escrow: await store.count("transactions", [["status", "==", "held"]]),
    open_tickets: await store.count("support_tickets", [["status", "==", "open"]]),
    pending_reports: await store.count("reports", [["status", "==", "pending"]]),
    pending_verifications: await store.count("verification_requests", [["status", "==", "pending"]]),
    today: {
      users: await store.count("users", [["created_at", ">=", midnight]]),
      products: await store.count("products", [["created_at", ">=", midnight]]),
      transactions: await store.count("transactions", [["created_at", ">=", midnight]])
    }
  };
}
