import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 10_000,
    unstubEnvs: true,
    unstubGlobals: true,
    // Forks keep every test file on a process main thread, so the root
    // context is named "main".
    pool: "forks",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
  },
});
