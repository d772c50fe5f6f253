import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // State tests swap HOME; os.homedir() only sees that in a child process.
    pool: "forks",
    testTimeout: 20_000,
  },
});
