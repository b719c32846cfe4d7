import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/**/src/__tests__/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      LOG_LEVEL: "silent"
    },
    testTimeout: 15000,
    hookTimeout: 15000
  }
});
