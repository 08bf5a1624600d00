import { SessionKey } from "../utils/types.js";

export type ChatKind = "private" | "group";

export interface SessionRef {
  readonly platform: string;
  readonly kind: ChatKind;
  readonly conversationId: string;
  readonly key: SessionKey;
}

const SEPARATOR = ":";

export function buildSessionKey(
  platform: string,
  kind: ChatKind,
  conversationId: string,
): SessionKey {
  if (platform.includes(SEPARATOR)) {
    throw new Error(`Platform name must not contain "${SEPARATOR}": ${platform}`);
  }
  return SessionKey.make(`${platform}${SEPARATOR}${kind}${SEPARATOR}${conversationId}`);
}

export function sessionRef(
  platform: string,
  kind: ChatKind,
  conversationId: string,
): SessionRef {
  return { platform, kind, conversationId, key: buildSessionKey(platform, kind, conversationId) };
}

/**
 * Inverse of {@link buildSessionKey}. Only the first two separators split,
 * so conversation ids may themselves contain ":".
 */
export function parseSessionKey(raw: string): SessionRef | null {
  const first = raw.indexOf(SEPARATOR);
  if (first <= 0) return null;
  const second = raw.indexOf(SEPARATOR, first + 1);
  if (second === -1) return null;

  const platform = raw.slice(0, first);
  const kind = raw.slice(first + 1, second);
  const conversationId = raw.slice(second + 1);
  if (kind !== "private" && kind !== "group") return null;
  if (conversationId.length === 0) return null;

  return { platform, kind, conversationId, key: SessionKey.make(raw) };
}
