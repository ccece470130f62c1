import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "~~": path.resolve(__dirname, "./packages/robustbench"),
    },
  },
  test: {
    include: ["packages/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
