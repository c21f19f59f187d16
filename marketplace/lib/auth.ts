import { timingSafeEqual } from "node:crypto";
import bcrypt from "bcryptjs";
import { SignJWT, jwtVerify } from "jose";
import { config } from "./config";
import { ApiError } from "./http";
import { getStore } from "./store";
import type { PublicUser, User } from "./types";

const secretKey = () => new TextEncoder().encode(config.jwtSecret);

// bcrypt only looks at the first 72 bytes; truncate explicitly so multi-byte
// passwords hash the same way across bcrypt implementations.
function bcryptInput(password: string): string {
  const bytes = Buffer.from(password, "utf8");
  return bytes.length <= 72 ? password : bytes.subarray(0, 72).toString("utf8");
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(bcryptInput(password), config.bcryptRounds);
}

export async function verifyPassword(password: string, hashed: string): Promise<boolean> {
  if (!hashed) return false;
  return bcrypt.compare(bcryptInput(password), hashed);
}

export async function createAccessToken(userId: string): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(userId)
    .setIssuedAt()
    .setExpirationTime(`${config.accessTokenMinutes}m`)
    .sign(secretKey());
}

export async function verifyAccessToken(token: string): Promise<string | null> {
  try {
    const { payload } = await jwtVerify(token, secretKey(), { algorithms: ["HS256"] });
    return typeof payload.sub === "string" && payload.sub ? payload.sub : null;
  } catch {
    return null;
  }
}

function bearer(request: Request): string | null {
  const header = request.headers.get("authorization") || "";
  const m = /^Bearer\s+(.+)$/i.exec(header.trim());
  return m ? m[1].trim() : null;
}

export function publicUser(user: User): PublicUser {
  const { hashed_password: _hidden, ...rest } = user;
  return rest;
}

async function resolveUser(request: Request): Promise<User | null> {
  const token = bearer(request);
  if (!token) return null;
  const userId = await verifyAccessToken(token);
  if (!userId) return null;
  return getStore().get("users", userId);
}

export async function requireUser(request: Request): Promise<User> {
  const user = await resolveUser(request);
  if (!user) throw new ApiError(401, "invalid_token");
  if (user.is_banned) throw new ApiError(403, "account_banned");
  return user;
}

export async function requireAdmin(request: Request): Promise<User> {
  const user = await requireUser(request);
  if (!user.is_admin) throw new ApiError(403, "admin_required");
  return user;
}

export async function optionalUser(request: Request): Promise<User | null> {
  try {
    const user = await resolveUser(request);
    return user && !user.is_banned ? user : null;
  } catch (e) {
    // eslint-disable-next-line no-console
    console.warn("[auth] optional user lookup failed", e);
    return null;
  }
}

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * True when the request carries CRON_SECRET as `Authorization: Bearer`,
 * `x-cron-secret` or `?secret=`.
 */
export function hasCronSecret(request: Request): boolean {
  const expected = config.cronSecret;
  if (!expected) return false;
  const authorization = request.headers.get("authorization") ?? "";
  const candidates = [
    authorization.startsWith("Bearer ") ? authorization.slice("Bearer ".length) : null,
    request.headers.get("x-cron-secret"),
    new URL(request.url).searchParams.get("secret")
  ];
  return candidates.some((given) => given !== null && sameSecret(given, expected));
}

export async function requireCronOrAdmin(request: Request): Promise<User | null> {
  if (hasCronSecret(request)) return null;
  return requireAdmin(request);
}
