export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Rejects with {@link TimeoutError} when the work does not settle in time. */
export async function withTimeout<T>(
  work: Promise<T> | (() => Promise<T>),
  timeoutMs: number,
  label = "operation",
): Promise<T> {
  const promise = typeof work === "function" ? Promise.resolve().then(work) : work;
  const waitMs = Math.max(1, Math.floor(timeoutMs));
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, waitMs)), waitMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export type Settled<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly timedOut: boolean; readonly error: unknown };

/** Like {@link withTimeout} but never rejects. */
export async function settleWithin<T>(
  work: Promise<T> | (() => Promise<T>),
  timeoutMs: number,
  label?: string,
): Promise<Settled<T>> {
  try {
    const value = await withTimeout(work, timeoutMs, label);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, timedOut: error instanceof TimeoutError, error };
  }
}
