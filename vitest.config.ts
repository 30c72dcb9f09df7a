import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL(".", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["test/**/*.spec.ts"],
    env: {
      LOG_LEVEL: "error",
      NODE_ENV: "test",
    },
  },
});
