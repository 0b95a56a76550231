import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.{test,spec}.ts", "tests/**/*.{test,spec}.ts"],
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
    testTimeout: 10_000,
  },
});
