import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    reporters: ["default"],
    globals: false,
    environment: "node",
    testTimeout: 20000,
  },
});
