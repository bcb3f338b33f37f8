import { defineConfig } from "vitest/config";

process.env.NODE_ENV ??= "test";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 30_000,
  },
});
