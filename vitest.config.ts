import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["client/__tests__/**/*.test.ts"],
    restoreMocks: true,
  },
});
