import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests are hermetic: never pick up a developer's `.env` file.
  envDir: ".vitest-env",
  test: {
    globals: true,
    pool: "threads",
    include: ["packages/**/src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    env: {
      NODE_ENV: "test",
    },
  },
});
