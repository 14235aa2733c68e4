import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(rootDir, "shared/index.ts"),
      "@": path.resolve(rootDir, "backend/src"),
    },
  },
  test: {
    environment: "node",
    include: ["backend/src/**/*.test.ts", "shared/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
