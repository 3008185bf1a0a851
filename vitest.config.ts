import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: false,
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
