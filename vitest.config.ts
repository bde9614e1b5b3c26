import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["pipelinectl/test/**/*.test.ts"],
    environment: "node",
  },
});
