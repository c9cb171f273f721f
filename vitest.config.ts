import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@gto-broker/shared", replacement: path.resolve(__dirname, "packages/shared/src") },
      { find: "@gto-broker/logger", replacement: path.resolve(__dirname, "packages/logger/src") },
      { find: "@gto-broker/solver-bridge", replacement: path.resolve(__dirname, "packages/solver-bridge/src") }
    ]
  }
});
