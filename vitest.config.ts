import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["tools/case-triage-agent/packages/*/tests/**/*.test.ts"]
  }
});
