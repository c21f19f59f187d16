import { createAccessToken, hashPassword, publicUser, verifyPassword } from "./auth";
import { sendEmail } from "./email/mailer";
import { ApiError } from "./http";
import { getStore } from "./store";
import { newId, nowIso } from "./time";
import type { Language, PublicUser, User } from "./types";

export type NewUserInput = {
  email: string;
  name: string;
  hashed_password: string;
  phone?: string | null;
  profile_image?: string | null;
  language?: Language;
  is_business_seller?: boolean;
  business_name?: string | null;
  vat_number?: string | null;
  is_admin?: boolean;
};

export function newUser(input: NewUserInput): User {
  return {
    id: newId(),
    email: input.email,
    name: input.name,
    hashed_password: input.hashed_password,
    phone: input.phone ?? null,
    profile_image: input.profile_image ?? null,
    language: input.language ?? "nl",
    is_business_seller: input.is_business_seller ?? false,
    business_name: input.business_name ?? null,
    vat_number: input.vat_number ?? null,
    is_admin: input.is_admin ?? false,
    is_banned: false,
    is_verified: false,
    verification_requested: false,
    verification_requested_at: null,
    trust_score: 50,
    completed_transactions: 0,
    cancelled_transactions: 0,
    reports_received: 0,
    rating_average: 0,
    rating_count: 0,
    is_featured_seller: false,
    created_at: nowIso(),
    last_login_at: null
  };
}

export async function findUserByEmail(email: string): Promise<User | null> {
  const [user] = await getStore().list("users", { where: [["email", "==", email.toLowerCase()]], limit: 1 });
  return user ?? null;
}

export type Session = { access_token: string; token_type: "bearer"; user: PublicUser };

async function session(user: User): Promise<Session> {
  return { access_token: await createAccessToken(user.id), token_type: "bearer", user: publicUser(user) };
}

export type RegisterInput = Omit<NewUserInput, "hashed_password" | "is_admin"> & { password: string };

export async function register(input: RegisterInput): Promise<Session> {
  const { password, ...profile } = input;
  if (await findUserByEmail(profile.email)) throw new ApiError(400, "email_exists");

  const user = newUser({ ...profile, email: profile.email.toLowerCase(), hashed_password: await hashPassword(password) });
  await getStore().create("users", user);

  try {
    await sendEmail(user, { type: "welcome", name: user.name });
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error("[auth register] welcome email failed", e);
  }
  return session(user);
}

export async function login(email: string, password: string): Promise<Session> {
  const user = await findUserByEmail(email);
  if (!user || !(await verifyPassword(password, user.hashed_password))) {
    throw new ApiError(400, "invalid_credentials");
  }
  if (user.is_banned) throw new ApiError(403, "account_banned");

  const last_login_at = nowIso();
  await getStore().update("users", user.id, { last_login_at });
  return session({ ...user, last_login_at });
}

/**
 * Removes the account and everything only it can see. Refused while the user
 * is a party to a pending or held transaction.
 */
export async function deleteAccount(user: User): Promise<void> {
  const store = getStore();
  const open = ["pending", "held"];
  const active =
    (await store.count("transactions", [["buyer_id", "==", user.id], ["status", "in", open]])) +
    (await store.count("transactions", [["seller_id", "==", user.id], ["status", "in", open]]));
  if (active > 0) throw new ApiError(409, "active_transactions");

  await store.deleteWhere("products", [["seller_id", "==", user.id]]);
  await store.delete("carts", user.id);
  await store.delete("wishlists", user.id);
  await store.delete("notification_preferences", user.id);
  await store.deleteWhere("notifications", [["user_id", "==", user.id]]);
  await store.deleteWhere("messages", [["sender_id", "==", user.id]]);
  await store.deleteWhere("conversations", [["participants", "array-contains", user.id]]);
  await store.deleteWhere("reports", [["reporter_id", "==", user.id]]);
  await store.delete("users", user.id);
  // eslint-disable-next-line no-console
  console.log("[users] account deleted", user.id);
}
