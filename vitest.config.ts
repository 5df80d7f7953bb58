import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    hookTimeout: 20000,
    globals: true,
    environment: "node",
    env: {
      NODE_ENV: "test"
    }
  }
});
