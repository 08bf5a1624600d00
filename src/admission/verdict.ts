import type { JudgeVerdict } from "../collaborators/types.js";

const ACCEPT_WORDS = new Set(["yes", "y", "reply", "respond"]);
const REJECT_WORDS = new Set(["no", "n", "skip", "ignore"]);
const REJECT_PREFIXES = ["no", "not", "don't", "dont", "n"];
const ACCEPT_PREFIXES = ["yes", "sure", "ok", "reply", "y"];

/**
 * Read a yes/no style answer from a text judge. Anything ambiguous is a
 * rejection; negative prefixes win over positive ones.
 */
export function parseJudgeVerdict(text: string | null | undefined): JudgeVerdict {
  if (!text) return "reject";
  const cleaned = text.trim().toLowerCase().replace(/[.,!?。，！？]+$/u, "");

  if (ACCEPT_WORDS.has(cleaned)) return "accept";
  if (REJECT_WORDS.has(cleaned)) return "reject";
  if (REJECT_PREFIXES.some((p) => cleaned.startsWith(p))) return "reject";
  if (ACCEPT_PREFIXES.some((p) => cleaned.startsWith(p))) return "accept";
  return "reject";
}
