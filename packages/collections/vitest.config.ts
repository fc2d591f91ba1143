import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cursorkit/collections",
    globals: true,
    environment: "node",
  },
});
