import { ApiError } from "./http";
import { notify } from "./notifications";
import { getMany, getStore } from "./store";
import { newId, nowIso } from "./time";
import { refreshSellerRating } from "./trust";
import type { PublicUser, Rating, Review, User } from "./types";
import { publicUser } from "./auth";
import { requireProduct } from "./catalog";

export async function createRating(
  rater: User,
  input: { rated_user_id: string; transaction_id: string; rating: number; comment?: string | null }
): Promise<Rating> {
  const store = getStore();
  const tx = await store.get("transactions", input.transaction_id);
  if (!tx || tx.buyer_id !== rater.id || tx.status !== "completed") throw new ApiError(404, "transaction_not_eligible");
  if (tx.seller_id !== input.rated_user_id) throw new ApiError(400, "rated_user_mismatch");

  const existing = await store.count("ratings", [
    ["transaction_id", "==", tx.id],
    ["rater_id", "==", rater.id]
  ]);
  if (existing > 0) throw new ApiError(400, "already_rated");

  const rating: Rating = {
    id: newId(),
    rater_id: rater.id,
    rated_user_id: tx.seller_id,
    transaction_id: tx.id,
    rating: input.rating,
    comment: input.comment ?? null,
    created_at: nowIso()
  };
  await store.create("ratings", rating);
  await refreshSellerRating(tx.seller_id);
  return rating;
}

export type RatingView = Rating & { rater_name: string; rater_profile_image: string | null };

export async function userRatings(userId: string, skip: number, limit: number): Promise<RatingView[]> {
  const store = getStore();
  const ratings = await store.list("ratings", {
    where: [["rated_user_id", "==", userId]],
    orderBy: { field: "created_at", direction: "desc" },
    offset: skip,
    limit
  });
  const raters = await getMany(store, "users", ratings.map((r) => r.rater_id));
  return ratings.map((r) => ({
    ...r,
    rater_name: raters.get(r.rater_id)?.name ?? "Anonymous",
    rater_profile_image: raters.get(r.rater_id)?.profile_image ?? null
  }));
}

export async function featuredSellers(limit: number): Promise<PublicUser[]> {
  const sellers = await getStore().list("users", { where: [["is_featured_seller", "==", true]] });
  return sellers
    .filter((u) => u.rating_count >= 5)
    .sort((a, b) => b.rating_average - a.rating_average)
    .slice(0, limit)
    .map(publicUser);
}

export async function createReview(user: User, productId: string, input: { rating: number; comment?: string | null }): Promise<Review> {
  const store = getStore();
  const product = await requireProduct(productId);

  const purchases = await store.count("transactions", [
    ["product_id", "==", productId],
    ["buyer_id", "==", user.id],
    ["status", "in", ["completed", "held"]]
  ]);
  if (purchases === 0) throw new ApiError(403, "not_purchased");

  const existing = await store.count("reviews", [
    ["product_id", "==", productId],
    ["user_id", "==", user.id]
  ]);
  if (existing > 0) throw new ApiError(400, "already_reviewed");

  const review: Review = {
    id: newId(),
    product_id: productId,
    user_id: user.id,
    seller_id: product.seller_id,
    rating: input.rating,
    comment: input.comment ?? null,
    created_at: nowIso()
  };
  await store.create("reviews", review);
  await notify(product.seller_id, {
    type: "review",
    title: "New Review Received",
    message: `You received a ${input.rating}-star review for '${product.title}'`,
    link: `/product/${productId}`
  });
  return review;
}

export type ReviewView = Review & { user_name: string; user_image: string | null };

export async function productReviews(productId: string): Promise<ReviewView[]> {
  const store = getStore();
  const reviews = await store.list("reviews", {
    where: [["product_id", "==", productId]],
    orderBy: { field: "created_at", direction: "desc" }
  });
  const authors = await getMany(store, "users", reviews.map((r) => r.user_id));
  return reviews.flatMap((r) => {
    const author = authors.get(r.user_id);
    return author ? [{ ...r, user_name: author.name, user_image: author.profile_image }] : [];
  });
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 100) / 100;
}

export async function productRating(productId: string): Promise<{ average_rating: number; total_reviews: number }> {
  const reviews = await getStore().list("reviews", { where: [["product_id", "==", productId]] });
  return { average_rating: average(reviews.map((r) => r.rating)), total_reviews: reviews.length };
}

export type RatingDistribution = Record<"1" | "2" | "3" | "4" | "5", number>;

export async function sellerReviewRating(
  sellerId: string
): Promise<{ average_rating: number; total_reviews: number; rating_distribution: RatingDistribution }> {
  const reviews = await getStore().list("reviews", { where: [["seller_id", "==", sellerId]] });
  const count = (n: number) => reviews.filter((r) => r.rating === n).length;
  return {
    average_rating: average(reviews.map((r) => r.rating)),
    total_reviews: reviews.length,
    rating_distribution: { "5": count(5), "4": count(4), "3": count(3), "2": count(2), "1": count(1) }
  };
}

export async function deleteReview(user: User, reviewId: string): Promise<void> {
  const store = getStore();
  const review = await store.get("reviews", reviewId);
  if (!review) throw new ApiError(404, "review_not_found");
  if (review.user_id !== user.id) throw new ApiError(403, "forbidden");
  await store.delete("reviews", reviewId);
}
