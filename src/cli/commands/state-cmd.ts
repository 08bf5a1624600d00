import { Command, Option } from "clipanion";
import { getStateDir } from "../../config/paths.js";
import { inspectStateDir } from "../../persistence/state-file.js";

function formatTime(ts: number): string {
  return ts > 0 ? new Date(ts).toISOString() : "never";
}

export class StateShowCommand extends Command {
  static override paths = [["state", "show"]];

  static override usage = Command.Usage({
    description: "Show persisted attention and proactive state",
    examples: [
      ["Show all sessions", "murmur state show"],
      ["Show one session", "murmur state show --session telegram:group:42"],
    ],
  });

  session = Option.String("--session", { required: false, description: "Only this session key" });
  dir = Option.String("--dir", { required: false, description: "State directory" });

  async execute(): Promise<void> {
    const stateDir = getStateDir(this.dir);
    const { attention, proactive } = await inspectStateDir(stateDir);
    const out = this.context.stdout;

    out.write(`State dir: ${stateDir}\n`);

    out.write(`\nAttention:\n`);
    if (attention.status === "missing") {
      out.write(`  (no attention state)\n`);
    } else if (attention.status === "invalid") {
      out.write(`  INVALID: ${attention.error}\n`);
      process.exitCode = 1;
    } else {
      const sessions = Object.entries(attention.data).filter(
        ([key]) => this.session === undefined || key === this.session,
      );
      if (sessions.length === 0) out.write(`  (no sessions)\n`);
      for (const [key, profiles] of sessions) {
        out.write(`  ${key}\n`);
        const ranked = Object.values(profiles).sort((a, b) => b.attentionScore - a.attentionScore);
        for (const p of ranked) {
          out.write(
            `    ${p.userName} (${p.userId}) attention=${p.attentionScore.toFixed(2)} ` +
              `emotion=${p.emotion.toFixed(2)} interactions=${p.interactionCount}\n`,
          );
        }
      }
    }

    out.write(`\nProactive:\n`);
    if (proactive.status === "missing") {
      out.write(`  (no proactive state)\n`);
    } else if (proactive.status === "invalid") {
      out.write(`  INVALID: ${proactive.error}\n`);
      process.exitCode = 1;
    } else {
      const sessions = Object.entries(proactive.data).filter(
        ([key]) => this.session === undefined || key === this.session,
      );
      if (sessions.length === 0) out.write(`  (no sessions)\n`);
      for (const [key, s] of sessions) {
        const cooldown = s.cooldownUntil > Date.now() ? ` cooldown-until=${formatTime(s.cooldownUntil)}` : "";
        out.write(
          `  ${key} last-bot-reply=${formatTime(s.lastBotReplyTime)} ` +
            `last-user-message=${formatTime(s.lastUserMessageTime)} failures=${s.consecutiveFailures}${cooldown}\n`,
        );
      }
    }
  }
}
