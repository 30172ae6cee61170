import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@foldline/transducers",
    globals: true,
    environment: "node",
  },
});
