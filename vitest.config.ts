import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["{lib,ingest,agents/*,destinations/*}/src/**/*.test.ts"],
    environment: "node",
  },
});
