import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Sets env vars before any application module (and config/env.ts) loads
    setupFiles: ["src/__tests__/setup.ts"],
  },
});
