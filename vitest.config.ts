import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      NODE_ENV: "test",
      MONGODB_URI: "mongodb://127.0.0.1:27017/harvest-test",
      ALLOWED_ORIGINS: "http://localhost:3000",
      JWT_SECRET: "test-secret-test-secret-test-secret-000",
      PAYSTACK_SECRET_KEY: "test-secret",
      PAYSTACK_WEBHOOK_SECRET: "test-webhook-secret",
      PAYSTACK_ENABLED: "true",
      MATURITY_WORKER_ENABLED: "false",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/*.spec.ts", "src/**/__tests__/**", "src/server.ts"],
    },
  },
});
