import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polycodec/codec",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
