import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/core",
    environment: "node",
    pool: "forks",
  },
});
