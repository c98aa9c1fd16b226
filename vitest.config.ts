import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    clearMocks: true,
    setupFiles: ["src/test/setup.ts"],
    include: ["src/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
