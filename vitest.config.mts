import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // CLI tests spawn a child process per case.
    testTimeout: 30000,
  },
});
