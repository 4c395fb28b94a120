import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["Tracker/test/*.test.ts", "Client/test/*.test.ts"],
    coverage: {
      include: ["Tracker/src/**/*.ts", "Client/**/*.ts"],
    },
  },
});
