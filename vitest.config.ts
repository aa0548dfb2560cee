import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["core/src/**/*.test.ts", "gateway/src/**/*.test.ts", "wallet/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10_000,
    clearMocks: true,
    restoreMocks: true,
  },
});
