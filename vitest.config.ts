import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["clarity-cli/**/*.test.ts"],
  },
});
