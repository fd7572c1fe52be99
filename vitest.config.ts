import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["admission-webhook/test/**/*.test.ts"],
    environment: "node",
  },
});
