import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@foldline/kernels",
    globals: true,
    environment: "node",
  },
});
