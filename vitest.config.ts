import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // config tests change the working directory, which worker threads do not allow
    pool: "forks",
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
