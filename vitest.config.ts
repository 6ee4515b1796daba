import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "cli/src/**/*.test.ts"],
    environment: "node",
  },
});
