import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    passWithNoTests: true,
    restoreMocks: true,
    server: {
      deps: {
        // clipanion's ESM build uses a directory import Node's resolver rejects
        inline: ["clipanion"],
      },
    },
  },
});
