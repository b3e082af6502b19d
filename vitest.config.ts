import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.spec.ts", "**/testing.ts"],
      reporter: ["text", "json", "html"],
    },
  },
  resolve: {
    alias: [
      // Strip .js from relative imports so vite resolves .ts source files
      { find: /^(\.{1,2}\/.*)\.js$/, replacement: "$1" },
    ],
  },
});
