import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    mockReset: true,
    // property runs drive thousands of writes
    testTimeout: 30000,
    hookTimeout: 10000,
    // Use threads pool with single thread for consistent test ordering
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    fileParallelism: false,
  },
});
