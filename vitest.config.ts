import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // The sandbox helper changes cwd, which worker threads do not allow.
    pool: "forks",
  },
});
