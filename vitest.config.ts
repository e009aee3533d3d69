// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(__dirname, "backend/services/shared"),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/services/**/test/**/*.spec.ts", "backend/tests/e2e/**/*.spec.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    hookTimeout: 20_000,
    testTimeout: 20_000,
  },
});
