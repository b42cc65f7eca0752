import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    // Minimal settings so modules importing config load without a .env
    env: {
      TELEGRAM_BOT_TOKEN: "test-token",
      REPOSITORIES: "demo=/tmp/demo-repo",
      MODELS: "test-provider/test-model",
      DATA_DIR: "/tmp/worktree-relay-test",
      LOG_LEVEL: "error",
    },
  },
});
