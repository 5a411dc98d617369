import { defineConfig } from "vitest/config";

export default defineConfig({
  // Avoid reading root `.env` files during tests. Tests should be hermetic and
  // should not require local credentials to exist.
  envDir: ".vitest-env",
  test: {
    globals: true,
    // Threads avoid forking child processes in restricted sandboxes.
    pool: "threads",
    include: ["packages/**/src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
