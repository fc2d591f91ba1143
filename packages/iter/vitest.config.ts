import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cursorkit/iter",
    globals: true,
    environment: "node",
  },
});
