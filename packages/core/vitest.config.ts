import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cursorkit/core",
    globals: true,
    environment: "node",
  },
});
