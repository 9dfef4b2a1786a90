import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

const aliases = [
  {
    find: "@tourlight/controller",
    replacement: path.resolve(rootDir, "packages/controller/src/index.ts"),
  },
  { find: "@tourlight/core", replacement: path.resolve(rootDir, "packages/core/src/index.ts") },
  {
    find: "@tourlight/narration",
    replacement: path.resolve(rootDir, "packages/narration/src/index.ts"),
  },
  { find: "@tourlight/overlay", replacement: path.resolve(rootDir, "packages/overlay/src/index.ts") },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json"],
      reportsDirectory: "coverage",
    },
  },
});
