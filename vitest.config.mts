import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [
    tsconfigPaths({
      projects: [path.resolve(root, "tsconfig.json")],
    }),
  ],

  resolve: {
    alias: {
      "@": path.resolve(root, "src"),
    },
  },

  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/_test_/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    clearMocks: true,
    env: {
      NODE_ENV: "test",
      DATABASE_PATH: ":memory:",
      LOG_LEVEL: "SILENT",
    },
  },
});
