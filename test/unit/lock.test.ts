import { describe, it, expect } from "vitest";
import { KeyedMutex, Mutex } from "../../src/utils/lock.js";

const tick = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("KeyedMutex", () => {
  it("serializes work for the same key", async () => {
    const lock = new KeyedMutex<string>();
    const order: string[] = [];

    const first = lock.runExclusive("a", async () => {
      await tick(20);
      order.push("first");
    });
    const second = lock.runExclusive("a", async () => {
      order.push("second");
    });

    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("lets different keys run concurrently", async () => {
    const lock = new KeyedMutex<string>();
    const order: string[] = [];

    const slow = lock.runExclusive("a", async () => {
      await tick(20);
      order.push("a");
    });
    const fast = lock.runExclusive("b", async () => {
      order.push("b");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["b", "a"]);
  });

  it("keeps the chain alive after a rejection", async () => {
    const lock = new KeyedMutex<string>();
    await expect(
      lock.runExclusive("a", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive("a", () => 42)).resolves.toBe(42);
  });
});

describe("Mutex", () => {
  it("serializes all callers", async () => {
    const lock = new Mutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      [1, 2, 3].map(() =>
        lock.runExclusive(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await tick(5);
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(1);
  });
});
