import { config } from "./config";
import { sendEmail } from "./email/mailer";
import { ApiError } from "./http";
import { getMany, getStore } from "./store";
import { addHours, nowIso } from "./time";
import type { Cart, Product, User, Wishlist } from "./types";

export async function getOrCreateCart(userId: string): Promise<Cart> {
  const store = getStore();
  const existing = await store.get("carts", userId);
  if (existing) return existing;
  const now = nowIso();
  return store.create("carts", { id: userId, user_id: userId, items: [], reminder_sent: false, created_at: now, updated_at: now });
}

export type CartView = Cart & { products: Product[]; total: number };

export async function viewCart(userId: string): Promise<CartView> {
  const cart = await getOrCreateCart(userId);
  const products = await getMany(getStore(), "products", cart.items.map((i) => i.product_id));
  const items = cart.items.flatMap((i) => {
    const p = products.get(i.product_id);
    return p ? [p] : [];
  });
  const total = Math.round(items.filter((p) => !p.is_sold).reduce((sum, p) => sum + p.price * 100, 0)) / 100;
  return { ...cart, products: items, total };
}

export async function addToCart(user: User, productId: string): Promise<Cart> {
  const store = getStore();
  const product = await store.get("products", productId);
  if (!product || product.is_sold) throw new ApiError(404, "product_unavailable");
  if (product.seller_id === user.id) throw new ApiError(400, "own_product");

  const cart = await getOrCreateCart(user.id);
  if (cart.items.some((i) => i.product_id === productId)) throw new ApiError(400, "already_in_cart");

  const now = nowIso();
  const patch = {
    items: [...cart.items, { product_id: productId, quantity: 1, added_at: now }],
    reminder_sent: false,
    updated_at: now
  };
  await store.update("carts", user.id, patch);
  return { ...cart, ...patch };
}

export async function removeFromCart(userId: string, productId: string): Promise<Cart> {
  const cart = await getOrCreateCart(userId);
  const items = cart.items.filter((i) => i.product_id !== productId);
  if (items.length === cart.items.length) throw new ApiError(404, "not_in_cart");
  const patch = { items, updated_at: nowIso() };
  await getStore().update("carts", userId, patch);
  return { ...cart, ...patch };
}

/**
 * Emails owners of carts left untouched for CART_REMINDER_HOURS. A cart is
 * flagged only after the mailer accepts the reminder, so failed sends retry on
 * the next run.
 */
export async function sendCartReminders(now: Date = new Date()): Promise<{ checked: number; sent: number }> {
  const store = getStore();
  const cutoff = addHours(now.toISOString(), -config.cartReminderHours);
  const carts = await store.list("carts", {
    where: [
      ["reminder_sent", "==", false],
      ["updated_at", "<", cutoff]
    ]
  });

  let sent = 0;
  for (const cart of carts) {
    if (cart.items.length === 0) continue;
    try {
      const user = await store.get("users", cart.user_id);
      if (!user) continue;
      const products = await getMany(store, "products", cart.items.map((i) => i.product_id));
      const titles = [...products.values()].filter((p) => !p.is_sold).map((p) => p.title);
      if (titles.length === 0) continue;

      const accepted = await sendEmail(user, { type: "cart_reminder", name: user.name, items: titles });
      if (accepted) {
        await store.update("carts", cart.id, { reminder_sent: true });
        sent += 1;
      }
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error("[cart reminders] failed for user", cart.user_id, e);
    }
  }
  // eslint-disable-next-line no-console
  console.log(`[cart reminders] ${sent}/${carts.length} reminders sent`);
  return { checked: carts.length, sent };
}

async function getOrCreateWishlist(userId: string): Promise<Wishlist> {
  const store = getStore();
  const existing = await store.get("wishlists", userId);
  if (existing) return existing;
  const now = nowIso();
  return store.create("wishlists", { id: userId, user_id: userId, product_ids: [], created_at: now, updated_at: now });
}

export async function viewWishlist(userId: string): Promise<{ products: Product[]; count: number }> {
  const wishlist = await getOrCreateWishlist(userId);
  const products = await getMany(getStore(), "products", wishlist.product_ids);
  const available = wishlist.product_ids.flatMap((id) => {
    const p = products.get(id);
    return p && !p.is_sold ? [p] : [];
  });
  return { products: available, count: available.length };
}

export async function addToWishlist(userId: string, productId: string): Promise<boolean> {
  const store = getStore();
  const product = await store.get("products", productId);
  if (!product) throw new ApiError(404, "product_not_found");
  const wishlist = await getOrCreateWishlist(userId);
  if (wishlist.product_ids.includes(productId)) return false;
  await store.update("wishlists", userId, { product_ids: [...wishlist.product_ids, productId], updated_at: nowIso() });
  return true;
}

export async function removeFromWishlist(userId: string, productId: string): Promise<boolean> {
  const wishlist = await getOrCreateWishlist(userId);
  if (!wishlist.product_ids.includes(productId)) return false;
  await getStore().update("wishlists", userId, {
    product_ids: wishlist.product_ids.filter((id) => id !== productId),
    updated_at: nowIso()
  });
  return true;
}

export async function isWishlisted(userId: string, productId: string): Promise<boolean> {
  const wishlist = await getStore().get("wishlists", userId);
  return wishlist?.product_ids.includes(productId) ?? false;
}
