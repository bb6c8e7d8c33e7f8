import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["backend/tests/**/*.test.ts"],
    exclude: ["node_modules/**"],
    testTimeout: 30000,
    hookTimeout: 60000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      LANGFUSE_ENABLED: "false",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["backend/src/**/*.ts"],
      exclude: ["backend/tests/**", "node_modules/**"],
    },
  },
});
