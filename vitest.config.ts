import { defineConfig } from "vitest/config";

// Every test file gets its own worker, so the in-memory SQLite handle and the
// settings/onboarding caches never leak between files.
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    pool: "forks",
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    onConsoleLog: (log) => !/\[dotenv@|tip:/i.test(log),
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
      reporter: ["text", "json-summary"],
    },
  },
});
