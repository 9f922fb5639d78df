import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/**/tests/**/*.test.ts"],
    setupFiles: ["apps/jobs/summarizer/tests/setup.ts"],
  },
});
