import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polycodec/results",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
