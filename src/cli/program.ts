import { Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { StateShowCommand } from "./commands/state-cmd.js";
import { StatusCommand } from "./commands/status.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Murmur",
    binaryName: "murmur",
    binaryVersion: VERSION,
  });

  // Status
  cli.register(StatusCommand);

  // State inspection
  cli.register(StateShowCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
