import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    exclude: ["test/fixtures/**"],
    environment: "node",
    // each in-memory program parses the ES2022 lib files once
    testTimeout: 20_000,
  },
});
