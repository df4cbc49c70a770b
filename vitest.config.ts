import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["nexusctl/test/**/*.test.ts"],
    environment: "node",
  },
});
