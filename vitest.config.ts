import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./marketplace", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["marketplace/tests/**/*.test.ts"],
    env: {
      APP_NAME: "Secondhand Market",
      FRONTEND_URL: "http://localhost:3000",
      SUPPORT_EMAIL: "support@example.com",
      BCRYPT_ROUNDS: "4",
      JWT_SECRET: "test-secret",
      CRON_SECRET: "test-cron-secret",
      SEED_SECRET: "test-seed-secret",
      ADMIN_EMAIL: "admin@example.com",
      ADMIN_PASSWORD: "test-admin-password",
      FORCE_FIRESTORE_MOCK: "1"
    }
  }
});
