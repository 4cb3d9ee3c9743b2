import { defineConfig } from "vitest/config";

const sharedEntry = new URL("./shared/src/index.ts", import.meta.url).pathname;

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "shared",
          root: "./shared",
          include: ["src/**/*.test.ts"],
        },
      },
      {
        resolve: {
          alias: {
            "@quantlake/shared": sharedEntry,
          },
        },
        test: {
          name: "ingestor",
          root: "./ingestor",
          include: ["src/**/*.test.ts"],
          testTimeout: 20000,
        },
      },
    ],
  },
});
