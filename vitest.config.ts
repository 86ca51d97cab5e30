import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["*.test.ts"],
    env: {
      PROVKIT_LOG_LEVEL: "silent",
    },
    testTimeout: 30000,
  },
});
