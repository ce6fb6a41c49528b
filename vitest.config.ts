import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "unit",
          include: ["src/__tests__/**/*.test.ts", "visualiser/src/__tests__/**/*.unit.test.ts"],
          environment: "node",
        },
      },
      {
        test: {
          name: "dom",
          include: ["visualiser/src/__tests__/**/*.dom.test.ts"],
          environment: "jsdom",
        },
      },
    ],
  },
});
