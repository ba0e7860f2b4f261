import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Several cases encode multi-megapixel images through sharp.
    testTimeout: 20_000,
    exclude: ["node_modules/**", "dist/**"],
  },
});
