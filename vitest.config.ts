import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["{shared,plugins,shell}/*/test/**/*.test.ts"],
    environment: "node",
  },
});
