import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test file patterns
    include: ["scripts/**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/logs/**"],

    // Environment configuration
    environment: "node",
    globals: true,
    setupFiles: ["./scripts/vitest.setup.ts"],

    // Test timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,
  },
});
