import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      MEDIA_RENAMER_LOG_FORMAT: "hidden",
    },
  },
});
