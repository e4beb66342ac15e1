import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/grammar",
    environment: "node",
  },
});
