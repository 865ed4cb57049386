import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    root: "./",
    // Only include tests from src directory, not compiled output
    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["dist/**/*", "node_modules/**/*"],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
