import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    // Every integration test starts worker threads.
    testTimeout: 20_000,
    // Cursor release tests force garbage collection.
    pool: "forks",
    poolOptions: {
      forks: { execArgv: ["--expose-gc"] },
    },
  },
});
