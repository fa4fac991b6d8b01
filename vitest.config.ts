import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts"],
    globals: true,
    env: {
      MOCK_OPENAI: "1",
      CACHE_BACKEND: "memory",
      LOG_LEVEL: "silent",
      GENERATION_TIMEOUT_MS: "200",
      RATE_LIMIT_SUGGESTIONS: "20 per hour",
      RATE_LIMIT_DEFAULT: "50 per hour"
    }
  }
});
