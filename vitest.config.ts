import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/gateway.ts",
        "src/channels/twilio/client.ts",
        "src/directory/sheets.ts",
        "src/assistant/openai-client.ts",
        "src/config/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
