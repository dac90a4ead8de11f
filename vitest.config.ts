import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // The out-of-bounds and wraparound tests run programs tens of thousands
    // of instructions long.
    testTimeout: 20_000,
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
