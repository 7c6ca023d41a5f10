import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "acl-cache/src/__tests__/**/*.test.ts",
      "shared/*/src/__tests__/**/*.test.ts",
    ],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    globals: true,
  },
});
