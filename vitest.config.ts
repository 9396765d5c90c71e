import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["esg-backend/src/**/__tests__/**/*.test.ts"],
    restoreMocks: true,
  },
});
