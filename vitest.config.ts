import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Watcher suites are timing-sensitive.
    fileParallelism: false
  }
});
