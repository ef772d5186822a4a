import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show the configuration summary the gateway would start with",
    examples: [["Show status", "turnrelay status"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const configPath = this.config ?? getConfigPath();

    let config;
    try {
      config = loadConfig(configPath);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const out = this.context.stdout;
    out.write(`turnrelay status\n`);
    out.write(`----------------\n`);
    out.write(`Config path: ${configPath}\n`);
    out.write(`Gateway:     ${config.gateway.hostname}:${config.gateway.port}\n`);
    out.write(
      `Batching:    idle ${config.batching.idleWindowSeconds}s, max ${config.batching.maxBatch} fragments\n`,
    );
    out.write(`Provider:    ${config.provider.active}\n`);
    out.write(`  evolution: ${config.evolution ? "configured" : "not configured"}\n`);
    out.write(`  twilio:    ${config.twilio ? "configured" : "not configured"}\n`);
    out.write(`Assistant:   ${config.assistant.model}${config.assistant.apiKey ? "" : " (no API key)"}\n`);
    out.write(`Directory:   ${config.directory.sheetId ? `sheet tab "${config.directory.tab}"` : "not configured"}\n`);
    out.write(`Access:      ${config.access.enabled ? `allowlist tab "${config.access.tab}"` : "open"}\n`);
    out.write(`Memory:      ${config.memory.redisUrl ? "redis" : "in-memory"}\n`);
    out.write(`Admin API:   ${config.gateway.adminToken ? "enabled" : "disabled"}\n`);
  }
}
