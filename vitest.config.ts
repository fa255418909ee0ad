import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: [
        "src/protocol/events.ts",
        "src/protocol/frame.ts",
        "src/protocol/reassembler.ts",
        "src/protocol/decoder.ts",
        "src/client/reducer.ts",
      ],
      thresholds: {
        lines: 95,
        functions: 90,
        branches: 90,
        statements: 95,
      },
    },
  },
});
