import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lineio/core",
    globals: true,
    environment: "node",
  },
});
