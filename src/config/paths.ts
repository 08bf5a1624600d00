import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const HISTORY_SUBDIR = "history";

/** Explicit override, then `MURMUR_STATE_DIR`, then `~/.murmur`. */
export function getStateDir(override?: string): string {
  return override ?? process.env["MURMUR_STATE_DIR"] ?? join(homedir(), ".murmur");
}

export function getConfigPath(): string {
  return process.env["MURMUR_CONFIG_PATH"] ?? "murmur.config.json";
}

/** Per-session JSONL logs live here. */
export function getHistoryDir(stateDir: string): string {
  return join(stateDir, HISTORY_SUBDIR);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
