// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // keep pino quiet; tests assert on values, not log lines
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
