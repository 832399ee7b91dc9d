import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "#core": fileURLToPath(new URL("./src/core", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts", "web/src/**/*.test.ts"],
    environment: "node",
  },
});
