import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly minTimeoutMs?: number;
  readonly staleMs?: number;
}

/**
 * Run `fn` while holding an advisory lock on `filePath`. The file itself
 * does not need to exist; the lock lives beside it as `<file>.lock`.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries ?? 3, minTimeout: options.minTimeoutMs ?? 100 },
      stale: options.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
