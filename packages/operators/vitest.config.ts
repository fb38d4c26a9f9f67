import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqkit/operators",
    globals: true,
    environment: "node",
  },
});
