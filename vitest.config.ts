import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["typescript/src/**/*.test.ts", "tests/integration/ts/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
  },
});
