import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["ofx/**/*_test.ts"],
    globals: false,
  },
});
