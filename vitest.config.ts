import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.spec.ts", "server/**/*.spec.ts", "scripts/**/*.spec.ts"],
    env: {
      LOG_LEVEL: "error",
    },
  },
});
