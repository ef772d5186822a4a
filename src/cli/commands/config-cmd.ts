import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { isErrnoException, loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { RelayConfig } from "../../config/types.js";

const REDACTED = "***REDACTED***";

function redact(value: string | undefined): string | undefined {
  return value ? REDACTED : value;
}

/** Copy of the config with every credential replaced. */
export function redactConfig(config: RelayConfig): RelayConfig {
  return {
    ...config,
    gateway: { ...config.gateway, adminToken: redact(config.gateway.adminToken) },
    evolution: config.evolution && { ...config.evolution, apiKey: REDACTED },
    twilio: config.twilio && { ...config.twilio, authToken: REDACTED },
    assistant: { ...config.assistant, apiKey: redact(config.assistant.apiKey) },
    memory: { ...config.memory, redisUrl: redact(config.memory.redisUrl) },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (secrets redacted)",
    examples: [["Show config", "turnrelay config show"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "turnrelay config validate"],
      ["Validate specific file", "turnrelay config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
