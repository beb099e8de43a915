import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10_000,
    benchmark: {
      include: ["src/**/*.bench.ts"],
    },
  },
});
