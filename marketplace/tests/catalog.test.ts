import { beforeEach, describe, expect, it } from "vitest";
import { GET as listProducts, POST as createProductRoute } from "@/app/api/products/route";
import {
  featuredProducts,
  filterProducts,
  haversineKm,
  pickSimilar,
  productQuerySchema,
  recommendedProducts,
  topCategory,
  trendingProducts,
  viewProduct
} from "@/lib/catalog";
import { addToWishlist } from "@/lib/cart";
import { newUser } from "@/lib/accounts";
import type { Product, User } from "@/lib/types";
import { createListing, createUser, installFakes, jsonRequest, none, type Harness } from "./helpers";

const AMSTERDAM = { lat: 52.3676, lng: 4.9041 };
const ROTTERDAM = { lat: 51.9244, lng: 4.4777 };

function product(id: string, overrides: Partial<Product> = {}): Product {
  return {
    id,
    title: `Item ${id}`,
    description: "A used item in decent shape",
    price: 100,
    category: "Electronics",
    condition: "good",
    images: [],
    pickup_address: "Coolsingel 40, Rotterdam",
    pickup_location: { address: "Coolsingel 40, Rotterdam", coordinates: ROTTERDAM },
    seller_id: "s1",
    seller_name: "Seller",
    is_sold: false,
    is_featured: false,
    views: 0,
    created_at: "2024-05-01T10:00:00.000Z",
    ...overrides
  };
}

function seller(id: string, overrides: Partial<User> = {}): User {
  return { ...newUser({ email: `${id}@example.com`, name: `Seller ${id}`, hashed_password: "x" }), id, ...overrides };
}

describe("haversineKm", () => {
  it("measures Amsterdam to Rotterdam at roughly 57 km", () => {
    const d = haversineKm(AMSTERDAM, ROTTERDAM);
    expect(d).toBeGreaterThan(56);
    expect(d).toBeLessThan(58);
  });

  it("is zero for the same point", () => {
    expect(haversineKm(AMSTERDAM, AMSTERDAM)).toBe(0);
  });
});

describe("filterProducts", () => {
  const now = new Date("2024-05-10T12:00:00.000Z");
  const sellers = new Map([
    ["s1", seller("s1")],
    ["s2", seller("s2", { is_business_seller: true, is_featured_seller: true, rating_average: 4.8 })]
  ]);
  const products = [
    product("cheap", { price: 20, created_at: "2024-05-09T12:00:00.000Z" }),
    product("mid", { price: 60, seller_id: "s2", views: 50 }),
    product("dear", { price: 300, category: "Fashion & Clothing", created_at: "2024-04-01T00:00:00.000Z" }),
    product("sold", { price: 10, is_sold: true }),
    product("local", {
      price: 80,
      pickup_address: "Damrak 1, Amsterdam",
      pickup_location: { address: "Damrak 1, Amsterdam", coordinates: AMSTERDAM }
    })
  ];
  const ids = (query: Record<string, string>) =>
    filterProducts(products, productQuerySchema.parse(query), sellers, now).map((p) => p.id);

  it("hides sold listings and sorts newest first by default", () => {
    expect(ids({})).toEqual(["cheap", "mid", "local", "dear"]);
  });

  it("filters by price range and category", () => {
    expect(ids({ min_price: "50", max_price: "100", sort_by: "price_low" })).toEqual(["mid", "local"]);
    expect(ids({ category: "Fashion & Clothing" })).toEqual(["dear"]);
  });

  it("filters by seller type", () => {
    expect(ids({ seller_type: "business" })).toEqual(["mid"]);
    expect(ids({ seller_type: "individual", sort_by: "price_high" })).toEqual(["dear", "local", "cheap"]);
  });

  it("matches search text in title or description, case-insensitively", () => {
    expect(ids({ search: "ITEM CHEAP" })).toEqual(["cheap"]);
  });

  it("filters by location text and date range", () => {
    expect(ids({ location: "amsterdam" })).toEqual(["local"]);
    expect(ids({ date_range: "24h" })).toEqual(["cheap"]);
  });

  it("limits by distance and reports it", () => {
    const near = filterProducts(
      products,
      productQuerySchema.parse({ lat: "52.3676", lng: "4.9041", distance: "10", sort_by: "nearest" }),
      sellers,
      now
    );
    expect(near.map((p) => [p.id, p.distance])).toEqual([["local", 0]]);
  });

  it("puts featured sellers first when sorting by featured", () => {
    expect(ids({ sort_by: "featured" })[0]).toBe("mid");
  });

  it("applies skip and limit after filtering", () => {
    expect(ids({ sort_by: "price_low", skip: "1", limit: "2" })).toEqual(["mid", "local"]);
  });
});

describe("pickSimilar", () => {
  const reference = product("ref", { price: 100, category: "Electronics" });
  const pool = [
    reference,
    product("same-cat", { price: 80 }),
    product("other-cat", { price: 120, category: "Books & Media" }),
    product("too-dear", { price: 200 }),
    product("sold", { price: 100, is_sold: true })
  ];

  it("prefers the same category inside the 70-130% price window", () => {
    expect(pickSimilar(reference, pool, 1).map((p) => p.id)).toEqual(["same-cat"]);
  });

  it("tops up from other categories", () => {
    expect(pickSimilar(reference, pool, 5).map((p) => p.id)).toEqual(["same-cat", "other-cat"]);
  });
});

describe("topCategory", () => {
  it("returns the most frequent category, first seen on ties", () => {
    const p = (category: string) => product(category, { category });
    expect(topCategory([p("A"), p("B"), p("B"), p("A")])).toBe("A");
    expect(topCategory([p("A"), p("B"), p("B")])).toBe("B");
    expect(topCategory([])).toBeNull();
  });
});

describe("catalog store operations", () => {
  let h: Harness;

  beforeEach(() => {
    h = installFakes();
  });

  it("creates a listing through the route with default coordinates", async () => {
    const { user, token } = await createUser();
    const res = await createProductRoute(
      jsonRequest(
        "/api/products",
        "POST",
        {
          title: "Road bike",
          description: "Aluminium frame, 56cm",
          price: 250,
          category: "Sports & Recreation",
          condition: "fair",
          pickup_address: "Neude 1, Utrecht"
        },
        token
      ),
      none
    );
    expect(res.status).toBe(201);
    const { product: created } = await res.json();
    expect(created.seller_id).toBe(user.id);
    expect(created.seller_name).toBe(user.name);
    expect(created.pickup_location).toEqual({ address: "Neude 1, Utrecht", coordinates: { lat: 52.3676, lng: 4.9041 } });
    expect(await h.store.count("products")).toBe(1);
  });

  it("lists unsold products with seller details", async () => {
    const { user } = await createUser({ rating_average: 4.2, rating_count: 3 });
    await createListing(user, { title: "Lamp" });
    await createListing(user, { title: "Chair", is_sold: true });
    const res = await listProducts(jsonRequest("/api/products"), none);
    const { products } = await res.json();
    expect(products.map((p: Product) => p.title)).toEqual(["Lamp"]);
    expect(products[0].seller_rating).toBe(4.2);
    expect(products[0].seller_rating_count).toBe(3);
  });

  it("counts views", async () => {
    const { user } = await createUser();
    const listing = await createListing(user, { views: 4 });
    expect((await viewProduct(listing.id)).views).toBe(5);
    expect((await h.store.get("products", listing.id))?.views).toBe(5);
  });

  it("returns only unsold featured listings", async () => {
    const { user } = await createUser();
    await createListing(user, { title: "Featured", is_featured: true });
    await createListing(user, { title: "Featured but sold", is_featured: true, is_sold: true });
    await createListing(user, { title: "Plain" });
    expect((await featuredProducts(10)).map((p) => p.title)).toEqual(["Featured"]);
  });

  it("ranks trending listings by views plus five per wishlist", async () => {
    const { user: sellerUser } = await createUser();
    const a = await createListing(sellerUser, { title: "A", views: 10 });
    const b = await createListing(sellerUser, { title: "B", views: 8 });
    for (let i = 0; i < 2; i++) {
      const { user } = await createUser();
      await addToWishlist(user.id, b.id);
    }
    const trending = await trendingProducts(2);
    expect(trending.map((p) => [p.id, p.trending_score])).toEqual([
      [b.id, 18],
      [a.id, 10]
    ]);
  });

  it("recommends the favourite wishlist category and skips wished items", async () => {
    const { user: sellerUser } = await createUser();
    const wished = await createListing(sellerUser, { category: "Books & Media", views: 1 });
    const sameCategory = await createListing(sellerUser, { category: "Books & Media", views: 5 });
    const popular = await createListing(sellerUser, { category: "Electronics", views: 100 });
    const { user } = await createUser();
    await addToWishlist(user.id, wished.id);

    const picks = await recommendedProducts(user, 2);
    expect(picks.map((p) => p.id)).toEqual([sameCategory.id, popular.id]);
  });
});
