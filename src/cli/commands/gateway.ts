import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";
import { VERSION } from "../../gateway/server.js";
import { printBanner } from "../banner.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the WhatsApp relay gateway",
    examples: [
      ["Start with default config", "turnrelay gateway run"],
      ["Start with custom config", "turnrelay gateway run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(VERSION);

    try {
      await startGateway(this.config);
      // Runs until a signal closes the server
      await new Promise(() => {});
    } catch (err) {
      this.context.stderr.write(
        `Failed to start gateway: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exit(1);
    }
  }
}
