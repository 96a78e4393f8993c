import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    pool: "forks",
    testTimeout: 30000,
    hookTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
