import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    // Engine tests change the working directory, which worker threads cannot do
    pool: "forks",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules/**/*", "dist/**/*"],
    testTimeout: 30000,
  },
});
