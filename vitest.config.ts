import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "lifecycle/control/src/**/*.test.ts",
      "lifecycle/tests/**/*.test.ts",
      "shell/tests/**/*.test.ts",
    ],
    environment: "node",
    restoreMocks: true,
  },
});
