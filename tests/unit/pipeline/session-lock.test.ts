/**
 * Unit tests for the per-session lock.
 */

import { KeyedMutex } from "../../../src/pipeline/session-lock";

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  it("serializes work on the same key", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const run = (name: string, ms: number) =>
      mutex.runExclusive("s1", async () => {
        events.push(`${name}-start`);
        await tick(ms);
        events.push(`${name}-end`);
      });
    await Promise.all([run("a", 30), run("b", 0)]);
    expect(events).toEqual(["a-start", "a-end", "b-start", "b-end"]);
  });

  it("grants the lock in request order", async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];
    await Promise.all([1, 2, 3].map((n) => mutex.runExclusive("s1", async () => void order.push(n))));
    expect(order).toEqual([1, 2, 3]);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire("x");
    await expect(mutex.runExclusive("y", async () => "done")).resolves.toBe("done");
    expect(mutex.isLocked("x")).toBe(true);
    release();
    expect(mutex.isLocked("x")).toBe(false);
  });

  it("releases after a failure", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive("s1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("s1", async () => 1)).resolves.toBe(1);
    expect(mutex.isLocked("s1")).toBe(false);
  });

  it("ignores a second release", async () => {
    const mutex = new KeyedMutex();
    const first = await mutex.acquire("s1");
    first();
    const second = await mutex.acquire("s1");
    first();
    expect(mutex.isLocked("s1")).toBe(true);
    second();
    expect(mutex.isLocked("s1")).toBe(false);
  });
});
