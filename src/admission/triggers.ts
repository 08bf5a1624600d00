export interface TriggerIdentity {
  readonly botId: string;
  readonly botName?: string;
  readonly mentionPattern?: string | RegExp;
}

export type TriggerKind = "direct_address" | "trigger_phrase";

export interface TriggerInput {
  readonly text: string;
  /** Set by the host when the platform flagged the bot as mentioned or replied to. */
  readonly mentionsBot?: boolean;
}

/**
 * Whether the message addresses the bot directly: a platform mention flag,
 * a custom pattern, or an @mention of the bot id or name.
 */
export function isDirectAddress(input: TriggerInput, identity: TriggerIdentity): boolean {
  if (input.mentionsBot) return true;

  if (identity.mentionPattern !== undefined) {
    const regex =
      identity.mentionPattern instanceof RegExp
        ? identity.mentionPattern
        : new RegExp(identity.mentionPattern, "i");
    if (regex.test(input.text)) return true;
  }

  for (const handle of [identity.botId, identity.botName]) {
    if (!handle) continue;
    const pattern = new RegExp(`@${escapeRegExp(handle)}(?![\\p{L}\\p{N}_])`, "iu");
    if (pattern.test(input.text)) return true;
  }
  return false;
}

/** First configured phrase contained in the text, case-insensitive. */
export function matchTriggerPhrase(text: string, phrases: readonly string[]): string | null {
  const haystack = text.toLowerCase();
  for (const phrase of phrases) {
    const needle = phrase.trim().toLowerCase();
    if (needle.length > 0 && haystack.includes(needle)) return phrase;
  }
  return null;
}

export function detectTrigger(
  input: TriggerInput,
  identity: TriggerIdentity,
  phrases: readonly string[],
): TriggerKind | null {
  if (isDirectAddress(input, identity)) return "direct_address";
  if (matchTriggerPhrase(input.text, phrases) !== null) return "trigger_phrase";
  return null;
}

/** Escape special regex characters in a literal string. */
export function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
