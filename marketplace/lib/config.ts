import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((v) => (v || "").trim() === "1" || (v || "").trim().toLowerCase() === "true");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  APP_NAME: z.string().default("Secondhand Market"),
  FRONTEND_URL: z.string().default("http://localhost:3000"),
  SUPPORT_EMAIL: z.string().default("support@example.com"),

  GCP_PROJECT_ID: z.string().optional(),
  GOOGLE_CLOUD_PROJECT: z.string().optional(),
  FIRESTORE_DB_ID: z.string().default("(default)"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  GCP_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FORCE_FIRESTORE_MOCK: flag,
  GCS_BUCKET_NAME: z.string().default("marketplace-uploads"),

  JWT_SECRET: z.string().default("dev-secret-change-me"),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

  STRIPE_API_KEY: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  SENDGRID_API_KEY: z.string().optional(),
  SENDER_EMAIL: z.string().default("noreply@example.com"),

  CRON_SECRET: z.string().optional(),
  SEED_SECRET: z.string().default("dev"),
  ADMIN_EMAIL: z.string().default("admin@example.com"),
  ADMIN_PASSWORD: z.string().default("change-me-admin"),

  COMMISSION_RATE: z.coerce.number().min(0).max(1).default(0.05),
  VAT_RATE: z.coerce.number().min(0).max(1).default(0.21),
  AUTO_RELEASE_DAYS: z.coerce.number().min(0).default(3),
  CART_REMINDER_HOURS: z.coerce.number().positive().default(24)
});

export type AppConfig = {
  env: string;
  appName: string;
  frontendUrl: string;
  supportEmail: string;
  firestore: {
    projectId: string | undefined;
    databaseId: string;
    keyFilename: string | undefined;
    serviceAccountJson: string | undefined;
    forceMock: boolean;
  };
  bucketName: string;
  jwtSecret: string;
  accessTokenMinutes: number;
  bcryptRounds: number;
  stripeApiKey: string | undefined;
  stripeWebhookSecret: string | undefined;
  sendgridApiKey: string | undefined;
  senderEmail: string;
  cronSecret: string | undefined;
  seedSecret: string;
  adminEmail: string;
  adminPassword: string;
  commissionRate: number;
  vatRate: number;
  autoReleaseDays: number;
  cartReminderHours: number;
};

// Placeholder keys shipped in .env templates count as "not configured".
function configured(value: string | undefined): string | undefined {
  const v = (value || "").trim();
  if (!v || /^YOUR_.*_HERE$/.test(v)) return undefined;
  return v;
}

/** GCP_SERVICE_ACCOUNT_JSON holds either the raw key JSON or its base64 encoding. */
export function parseServiceAccount(raw: string): Record<string, string> {
  const text = raw.trim().startsWith("{") ? raw : Buffer.from(raw, "base64").toString("utf8");
  return JSON.parse(text);
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const e = envSchema.parse(env);
  return {
    env: e.NODE_ENV,
    appName: e.APP_NAME,
    frontendUrl: e.FRONTEND_URL.replace(/\/+$/, ""),
    supportEmail: e.SUPPORT_EMAIL,
    firestore: {
      projectId: e.GCP_PROJECT_ID || e.GOOGLE_CLOUD_PROJECT,
      databaseId: e.FIRESTORE_DB_ID,
      keyFilename: configured(e.GOOGLE_APPLICATION_CREDENTIALS),
      serviceAccountJson: configured(e.GCP_SERVICE_ACCOUNT_JSON),
      forceMock: e.FORCE_FIRESTORE_MOCK
    },
    bucketName: e.GCS_BUCKET_NAME,
    jwtSecret: e.JWT_SECRET,
    accessTokenMinutes: e.ACCESS_TOKEN_EXPIRE_MINUTES,
    bcryptRounds: e.BCRYPT_ROUNDS,
    stripeApiKey: configured(e.STRIPE_API_KEY),
    stripeWebhookSecret: configured(e.STRIPE_WEBHOOK_SECRET),
    sendgridApiKey: configured(e.SENDGRID_API_KEY),
    senderEmail: e.SENDER_EMAIL,
    cronSecret: configured(e.CRON_SECRET),
    seedSecret: e.SEED_SECRET,
    adminEmail: e.ADMIN_EMAIL,
    adminPassword: e.ADMIN_PASSWORD,
    commissionRate: e.COMMISSION_RATE,
    vatRate: e.VAT_RATE,
    autoReleaseDays: e.AUTO_RELEASE_DAYS,
    cartReminderHours: e.CART_REMINDER_HOURS
  };
}

export const config: AppConfig = loadConfig(process.env);
