import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    globals: true,
    // the real-git suites spawn many short git processes
    hookTimeout: 30000,
    testTimeout: 30000,
  },
});
