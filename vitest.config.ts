import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*_test.ts"],
    environment: "node",
    env: { LOG_LEVEL: "none" },
    // Logger and registry tests patch process-wide state
    fileParallelism: false,
  },
});
