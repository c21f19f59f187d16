import { getStore } from "./store";
import type { User } from "./types";

const DAY_MS = 86_400_000;

type TrustInputs = Pick<
  User,
  | "completed_transactions"
  | "cancelled_transactions"
  | "reports_received"
  | "rating_average"
  | "is_verified"
  | "created_at"
>;

export function computeTrustScore(user: TrustInputs, now: Date = new Date()): number {
  let score = 50;
  score += Math.min((user.completed_transactions || 0) * 2, 20);
  if (user.rating_average > 0) score += (user.rating_average / 5) * 15;
  if (user.is_verified) score += 10;

  const ageDays = Math.floor((now.getTime() - Date.parse(user.created_at)) / DAY_MS);
  score += Math.min(Math.max(ageDays, 0) / 30, 10);

  score -= (user.cancelled_transactions || 0) * 2;
  score -= (user.reports_received || 0) * 5;

  score = Math.max(0, Math.min(100, score));
  return Math.round(score * 10) / 10;
}

export function trustBadge(score: number): string {
  if (score >= 90) return "🌟";
  if (score >= 75) return "⭐";
  if (score >= 50) return "✓";
  return "⚠️";
}

/** Recomputes and stores the user's trust score. Unknown users score 50. */
export async function refreshTrustScore(userId: string): Promise<number> {
  const store = getStore();
  const user = await store.get("users", userId);
  if (!user) return 50;
  const trust_score = computeTrustScore(user);
  await store.update("users", userId, { trust_score });
  return trust_score;
}

export type SellerRating = { rating_average: number; rating_count: number; is_featured_seller: boolean };

export function summarizeRatings(values: number[]): SellerRating {
  if (values.length === 0) return { rating_average: 0, rating_count: 0, is_featured_seller: false };
  const avg = Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 10) / 10;
  return { rating_average: avg, rating_count: values.length, is_featured_seller: avg >= 4.5 && values.length >= 5 };
}

export async function refreshSellerRating(sellerId: string): Promise<SellerRating> {
  const store = getStore();
  const ratings = await store.list("ratings", { where: [["rated_user_id", "==", sellerId]] });
  const summary = summarizeRatings(ratings.map((r) => r.rating));
  if (summary.rating_count > 0) await store.update("users", sellerId, summary);
  await refreshTrustScore(sellerId);
  return summary;
}
