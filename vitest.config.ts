import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      MCP_LOG_LEVEL: "error",
      MODEL_DB_PATH: ":memory:",
      OTEL_ENABLED: "false",
    },
  },
});
