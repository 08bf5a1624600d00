import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults applied",
    examples: [["Show config", "murmur config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    try {
      const config = loadConfig(this.configFile);
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "murmur config validate"],
      ["Validate specific file", "murmur config validate ./murmur.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    const content = readConfigFile(configPath);
    if (content === null) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      const substituted = substituteEnv(content);
      const raw = JSON.parse(substituted) as unknown;
      parseConfig(raw);
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
