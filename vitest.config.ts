import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: fromRoot("./src/core/index.ts") },
      { find: /^@cli\/(.*)$/, replacement: fromRoot("./src/cli/$1") },
      { find: /^@domain\/(.*)$/, replacement: fromRoot("./src/core/domain/$1") },
      { find: /^@lib\/(.*)$/, replacement: fromRoot("./src/core/lib/$1") },
      { find: /^@services\/(.*)$/, replacement: fromRoot("./src/core/services/$1") }
    ]
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node"
  }
});
