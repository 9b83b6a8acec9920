import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@zoom-attendance\/core$/,
        replacement: path.resolve(__dirname, "packages/core/src/index.ts"),
      },
      {
        find: /^@zoom-attendance\/core\/(.*)$/,
        replacement: path.resolve(__dirname, "packages/core/$1"),
      },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
