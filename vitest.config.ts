import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NO_COLOR: "1",
    },
  },
});
