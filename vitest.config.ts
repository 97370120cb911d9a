import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/*.test.ts"],
    // Shiki's first highlighter load can be slow on cold caches
    testTimeout: 30000,
  },
});
