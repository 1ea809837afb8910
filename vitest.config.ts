import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["daemon/src/**/*.test.ts"],
    environment: "node",
  },
});
