import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    // tfjs training loops in the stage tests run a few hundred optimizer steps
    testTimeout: 60_000,
  },
});
