import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@foldline/pipeline",
    globals: true,
    environment: "node",
  },
});
