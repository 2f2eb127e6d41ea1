import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/**/*.test.ts", "server/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    unstubGlobals: true,
  },
});
