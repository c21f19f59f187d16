import { z } from "zod";
import { ApiError } from "./http";
import { getMany, getStore } from "./store";
import { newId, nowIso } from "./time";
import { CONDITIONS, type Coordinates, type Product, type User } from "./types";

export const CATEGORIES = [
  "Electronics",
  "Fashion & Clothing",
  "Home & Garden",
  "Sports & Recreation",
  "Books & Media",
  "Toys & Games",
  "Cars & Vehicles",
  "Art & Antiques",
  "Musical Instruments",
  "Other"
] as const;

// Pickup point used when the seller sends no coordinates (Amsterdam).
export const DEFAULT_COORDINATES: Coordinates = { lat: 52.3676, lng: 4.9041 };

export const SORT_OPTIONS = ["newest", "oldest", "price_low", "price_high", "popular", "nearest", "featured"] as const;
export type SortOption = (typeof SORT_OPTIONS)[number];

const optionalNumber = z.preprocess((v) => (v === "" || v === null ? undefined : v), z.coerce.number().optional());

export const productQuerySchema = z.object({
  category: z.string().optional(),
  search: z.string().optional(),
  min_price: optionalNumber,
  max_price: optionalNumber,
  location: z.string().optional(),
  condition: z.enum(CONDITIONS).optional(),
  seller_type: z.enum(["business", "individual"]).optional(),
  date_range: z.enum(["24h", "7d", "30d"]).optional(),
  lat: optionalNumber,
  lng: optionalNumber,
  distance: optionalNumber,
  sort_by: z.enum(SORT_OPTIONS).default("newest"),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

export type ProductQuery = z.infer<typeof productQuerySchema>;

export type ProductWithSeller = Product & {
  distance?: number;
  seller_rating: number;
  seller_rating_count: number;
  is_featured_seller: boolean;
  seller_profile_image: string | null;
};

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: Coordinates, b: Coordinates): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(b.lat - a.lat);
  const dLng = rad(b.lng - a.lng);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(a.lat)) * Math.cos(rad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

const RANGE_MS: Record<NonNullable<ProductQuery["date_range"]>, number> = {
  "24h": 24 * 3_600_000,
  "7d": 7 * 86_400_000,
  "30d": 30 * 86_400_000
};

export function withSeller(product: Product & { distance?: number }, seller: User | undefined): ProductWithSeller {
  return {
    ...product,
    seller_name: seller?.name ?? "Unknown",
    seller_rating: seller?.rating_average ?? 0,
    seller_rating_count: seller?.rating_count ?? 0,
    is_featured_seller: seller?.is_featured_seller ?? false,
    seller_profile_image: seller?.profile_image ?? null
  };
}

/**
 * Applies every listing filter and the requested order, then the skip/limit
 * window. Sold listings never appear. `sellers` must hold the seller of every
 * product that should be considered for seller_type and featured ordering.
 */
export function filterProducts(
  products: Product[],
  query: ProductQuery,
  sellers: Map<string, User>,
  now: Date = new Date()
): ProductWithSeller[] {
  const search = query.search?.trim().toLowerCase();
  const location = query.location?.trim().toLowerCase();
  const since = query.date_range ? new Date(now.getTime() - RANGE_MS[query.date_range]).toISOString() : null;
  const origin = query.lat !== undefined && query.lng !== undefined ? { lat: query.lat, lng: query.lng } : null;

  const out: ProductWithSeller[] = [];
  for (const p of products) {
    if (p.is_sold) continue;
    if (query.category && p.category !== query.category) continue;
    if (query.condition && p.condition !== query.condition) continue;
    if (query.min_price !== undefined && p.price < query.min_price) continue;
    if (query.max_price !== undefined && p.price > query.max_price) continue;
    if (location && !p.pickup_address.toLowerCase().includes(location)) continue;
    if (since && p.created_at < since) continue;
    if (search && !p.title.toLowerCase().includes(search) && !p.description.toLowerCase().includes(search)) continue;

    const seller = sellers.get(p.seller_id);
    if (query.seller_type === "business" && !seller?.is_business_seller) continue;
    if (query.seller_type === "individual" && seller?.is_business_seller) continue;

    let distance: number | undefined;
    if (origin && query.distance !== undefined) {
      const d = haversineKm(origin, p.pickup_location.coordinates);
      if (d > query.distance) continue;
      distance = Math.round(d * 100) / 100;
    }
    out.push(withSeller(distance === undefined ? p : { ...p, distance }, seller));
  }

  out.sort(comparator(query.sort_by));
  return out.slice(query.skip, query.skip + query.limit);
}

function comparator(sort: SortOption): (a: ProductWithSeller, b: ProductWithSeller) => number {
  const newest = (a: ProductWithSeller, b: ProductWithSeller) =>
    a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0;
  switch (sort) {
    case "oldest":
      return (a, b) => newest(b, a);
    case "price_low":
      return (a, b) => a.price - b.price;
    case "price_high":
      return (a, b) => b.price - a.price;
    case "popular":
      return (a, b) => b.views - a.views;
    case "nearest":
      return (a, b) => (a.distance ?? Number.MAX_VALUE) - (b.distance ?? Number.MAX_VALUE);
    case "featured":
      return (a, b) =>
        Number(b.is_featured_seller) - Number(a.is_featured_seller) || b.seller_rating - a.seller_rating || newest(a, b);
    default:
      return newest;
  }
}

export type NewProduct = {
  title: string;
  description: string;
  price: number;
  category: string;
  condition: Product["condition"];
  images: string[];
  pickup_address: string;
  pickup_coordinates?: Coordinates;
  is_featured: boolean;
};

export async function createProduct(seller: User, input: NewProduct): Promise<Product> {
  const { pickup_coordinates, ...fields } = input;
  const product: Product = {
    id: newId(),
    ...fields,
    pickup_location: { address: input.pickup_address, coordinates: pickup_coordinates ?? DEFAULT_COORDINATES },
    seller_id: seller.id,
    seller_name: seller.name,
    is_sold: false,
    views: 0,
    created_at: nowIso()
  };
  return getStore().create("products", product);
}

export async function requireProduct(productId: string): Promise<Product> {
  const product = await getStore().get("products", productId);
  if (!product) throw new ApiError(404, "product_not_found");
  return product;
}

/** Loads a listing for display and counts the view. */
export async function viewProduct(productId: string): Promise<Product> {
  const product = await requireProduct(productId);
  await getStore().increment("products", productId, "views", 1);
  return { ...product, views: product.views + 1 };
}

export async function hasOpenTransactions(productId: string): Promise<boolean> {
  const open = await getStore().count("transactions", [
    ["product_id", "==", productId],
    ["status", "in", ["pending", "held"]]
  ]);
  return open > 0;
}

export async function deleteProduct(user: User, productId: string): Promise<void> {
  const product = await requireProduct(productId);
  if (product.seller_id !== user.id) throw new ApiError(403, "forbidden");
  if (await hasOpenTransactions(productId)) throw new ApiError(409, "active_transactions");
  await getStore().delete("products", productId);
}

export async function featuredProducts(limit: number): Promise<ProductWithSeller[]> {
  const featured = await getStore().list("products", {
    where: [
      ["is_featured", "==", true],
      ["is_sold", "==", false]
    ],
    orderBy: { field: "created_at", direction: "desc" },
    limit
  });
  return enrichProducts(featured);
}

export async function similarProducts(productId: string, limit: number): Promise<Product[]> {
  const reference = await requireProduct(productId);
  const pool = await getStore().list("products", {
    where: [
      ["is_sold", "==", false],
      ["price", ">=", reference.price * 0.7],
      ["price", "<=", reference.price * 1.3]
    ]
  });
  return pickSimilar(reference, pool, limit);
}

export async function searchProducts(query: ProductQuery): Promise<ProductWithSeller[]> {
  const store = getStore();
  const products = await store.list("products", {
    where: query.category ? [["is_sold", "==", false], ["category", "==", query.category]] : [["is_sold", "==", false]]
  });
  const sellers = await getMany(store, "users", products.map((p) => p.seller_id));
  return filterProducts(products, query, sellers);
}

export async function enrichProducts(products: Array<Product & { distance?: number }>): Promise<ProductWithSeller[]> {
  const sellers = await getMany(getStore(), "users", products.map((p) => p.seller_id));
  return products.map((p) => withSeller(p, sellers.get(p.seller_id)));
}

async function mostViewedUnsold(limit: number): Promise<Product[]> {
  return getStore().list("products", {
    where: [["is_sold", "==", false]],
    orderBy: { field: "views", direction: "desc" },
    limit
  });
}

export type TrendingProduct = Product & { wishlist_count: number; trending_score: number };

export async function trendingProducts(limit: number): Promise<TrendingProduct[]> {
  const store = getStore();
  const candidates = await mostViewedUnsold(limit * 2);
  const scored: TrendingProduct[] = [];
  for (const p of candidates) {
    const wishlist_count = await store.count("wishlists", [["product_ids", "array-contains", p.id]]);
    scored.push({ ...p, wishlist_count, trending_score: p.views + wishlist_count * 5 });
  }
  return scored.sort((a, b) => b.trending_score - a.trending_score).slice(0, limit);
}

export function pickSimilar(reference: Product, pool: Product[], limit: number): Product[] {
  const min = reference.price * 0.7;
  const max = reference.price * 1.3;
  const inRange = pool.filter((p) => !p.is_sold && p.id !== reference.id && p.price >= min && p.price <= max);
  const same = inRange.filter((p) => p.category === reference.category).slice(0, limit);
  if (same.length >= limit) return same;
  const other = inRange.filter((p) => p.category !== reference.category).slice(0, limit - same.length);
  return [...same, ...other];
}

/** Most frequent category among the products, first seen wins ties. */
export function topCategory(products: Product[]): string | null {
  const counts = new Map<string, number>();
  for (const p of products) counts.set(p.category, (counts.get(p.category) ?? 0) + 1);
  let best: string | null = null;
  let bestCount = 0;
  for (const [category, count] of counts) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

export async function recommendedProducts(user: User | null, limit: number): Promise<Product[]> {
  const store = getStore();
  const picks: Product[] = [];

  if (user) {
    const wishlist = await store.get("wishlists", user.id);
    const wished = new Set(wishlist?.product_ids ?? []);
    const wishedProducts = [...(await getMany(store, "products", wished)).values()];
    const category = topCategory(wishedProducts);
    if (category) {
      const inCategory = await store.list("products", {
        where: [
          ["category", "==", category],
          ["is_sold", "==", false]
        ],
        orderBy: { field: "views", direction: "desc" }
      });
      picks.push(...inCategory.filter((p) => !wished.has(p.id)).slice(0, limit));
    }
  }

  if (picks.length < limit) {
    const seen = new Set(picks.map((p) => p.id));
    const popular = await mostViewedUnsold(limit * 2);
    picks.push(...popular.filter((p) => !seen.has(p.id)).slice(0, limit - picks.length));
  }
  return picks;
}
