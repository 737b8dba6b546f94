import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
    testTimeout: 20000,
  },
  resolve: {
    alias: {
      "@": path.resolve(root, "src"),
      "~shared": path.resolve(root, "deps/shared/src"),
      "~test": path.resolve(root, "test"),
    },
  },
});
