import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { Cli } from "clipanion";
import { createCli } from "../../src/cli/program.js";
import { ATTENTION_FILE, PROACTIVE_FILE } from "../../src/persistence/state-file.js";

// Helper to capture stdout
function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk: Buffer, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

async function run(args: string[]): Promise<{ code: number; output: string }> {
  const { stream, output } = captureStdout();
  const code = await createCli().run(args, { ...Cli.defaultContext, stdout: stream });
  return { code, output: output() };
}

describe("CLI", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "murmur-cli-"));
    process.exitCode = undefined;
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    delete process.env["MURMUR_CONFIG_PATH"];
    delete process.env["MURMUR_STATE_DIR"];
    process.exitCode = undefined;
  });

  describe("config validate", () => {
    it("accepts a valid file", async () => {
      const path = join(tempDir, "valid.json");
      writeFileSync(path, JSON.stringify({ admission: { initialProbability: 0.2 } }));

      const { output } = await run(["config", "validate", path]);
      expect(output).toBe(`Config is valid: ${path}\n`);
      expect(process.exitCode).not.toBe(1);
    });

    it("rejects an invalid file", async () => {
      const path = join(tempDir, "invalid.json");
      writeFileSync(path, JSON.stringify({ admission: { initialProbability: "high" } }));

      const { output } = await run(["config", "validate", path]);
      expect(output.startsWith(`Config is INVALID: ${path}\n`)).toBe(true);
      expect(process.exitCode).toBe(1);
    });

    it("reports a missing file", async () => {
      const path = join(tempDir, "absent.json");
      const { output } = await run(["config", "validate", path]);
      expect(output).toBe(`Config file not found: ${path}\n`);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config show", () => {
    it("prints the effective config", async () => {
      const path = join(tempDir, "murmur.config.json");
      writeFileSync(path, JSON.stringify({ identity: { botId: "helper_bot" } }));

      const { output } = await run(["config", "show", path]);
      const shown: unknown = JSON.parse(output);
      expect(shown).toMatchObject({ identity: { botId: "helper_bot" }, buffer: { maxSize: 10 } });
    });
  });

  describe("state show", () => {
    beforeEach(() => {
      writeFileSync(
        join(tempDir, ATTENTION_FILE),
        JSON.stringify({
          "mock:group:chat-1": {
            u1: {
              userId: "u1",
              userName: "Alex",
              attentionScore: 0.5,
              emotion: -0.25,
              lastInteraction: 0,
              interactionCount: 3,
              lastMessagePreview: "hi",
              updatedAt: 0,
            },
          },
        }),
      );
      writeFileSync(
        join(tempDir, PROACTIVE_FILE),
        JSON.stringify({
          "mock:group:chat-1": {
            lastBotReplyTime: Date.UTC(2026, 5, 15, 12),
            lastUserMessageTime: 0,
            lastProactiveTime: 0,
            consecutiveFailures: 1,
            cooldownUntil: 0,
            userMessageTimestamps: [],
          },
        }),
      );
    });

    it("prints both tables", async () => {
      const { output } = await run(["state", "show", "--dir", tempDir]);
      expect(output).toBe(
        `State dir: ${tempDir}\n` +
          `\nAttention:\n` +
          `  mock:group:chat-1\n` +
          `    Alex (u1) attention=0.50 emotion=-0.25 interactions=3\n` +
          `\nProactive:\n` +
          `  mock:group:chat-1 last-bot-reply=2026-06-15T12:00:00.000Z last-user-message=never failures=1\n`,
      );
    });

    it("filters by session", async () => {
      const { output } = await run(["state", "show", "--dir", tempDir, "--session", "mock:group:other"]);
      expect(output).toBe(
        `State dir: ${tempDir}\n\nAttention:\n  (no sessions)\n\nProactive:\n  (no sessions)\n`,
      );
    });

    it("flags a corrupt table", async () => {
      writeFileSync(join(tempDir, PROACTIVE_FILE), "{ torn");
      const { output } = await run(["state", "show", "--dir", tempDir]);
      expect(output).toContain("\nProactive:\n  INVALID: ");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("status", () => {
    it("summarizes the configuration", async () => {
      const path = join(tempDir, "murmur.config.json");
      writeFileSync(path, JSON.stringify({ proactive: { enabled: true, checkIntervalSec: 120 } }));
      process.env["MURMUR_CONFIG_PATH"] = path;
      process.env["MURMUR_STATE_DIR"] = tempDir;

      const { output } = await run(["status"]);
      expect(output).toBe(
        "Murmur Status\n" +
          "-------------\n" +
          `Config path: ${path}\n` +
          `State dir:   ${tempDir}\n` +
          "Admission:   base=0.1 after-reply=0.8 for 300s\n" +
          "Attention:   enabled (max 10 users)\n" +
          "Frequency:   disabled\n" +
          "Proactive:   every 120s, p=0.3\n",
      );
    });
  });
});
