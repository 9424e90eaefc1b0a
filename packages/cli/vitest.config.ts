import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lineio/cli",
    globals: true,
    environment: "node",
  },
});
