import { Command } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import type { MurmurConfig } from "../../config/types.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show engine configuration summary",
    examples: [["Show status", "murmur status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let config: MurmurConfig;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const { admission, attention, frequency, proactive } = config;
    this.context.stdout.write(`Murmur Status\n`);
    this.context.stdout.write(`-------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(
      `Admission:   base=${admission.initialProbability} after-reply=${admission.afterReplyProbability} ` +
        `for ${admission.boostDurationSec}s\n`,
    );
    this.context.stdout.write(
      `Attention:   ${attention.enabled ? "enabled" : "disabled"} (max ${attention.maxTrackedUsers} users)\n`,
    );
    this.context.stdout.write(`Frequency:   ${frequency.enabled ? "enabled" : "disabled"}\n`);
    this.context.stdout.write(
      `Proactive:   ${proactive.enabled ? `every ${proactive.checkIntervalSec}s, p=${proactive.probability}` : "disabled"}\n`,
    );
    if (proactive.quietHours.enabled) {
      this.context.stdout.write(
        `Quiet hours: ${proactive.quietHours.start}-${proactive.quietHours.end}\n`,
      );
    }
  }
}
