import { Cli } from "clipanion";
import { VERSION } from "../gateway/server.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { GatewayRunCommand } from "./commands/gateway.js";
import { StatusCommand } from "./commands/status.js";
import { TurnsFlushCommand, TurnsListCommand } from "./commands/turns.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "turnrelay",
    binaryName: "turnrelay",
    binaryVersion: VERSION,
  });

  cli.register(GatewayRunCommand);
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Admin commands against a running gateway
  cli.register(TurnsListCommand);
  cli.register(TurnsFlushCommand);

  return cli;
}
