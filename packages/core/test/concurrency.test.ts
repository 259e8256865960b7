import { describe, it, expect } from "vitest";
import {
  AsyncSemaphore,
  Lock,
  concurrentPerform,
  concurrentForEach,
  yieldToEventLoop,
} from "../src/concurrency.js";

describe("AsyncSemaphore", () => {
  it("never runs more tasks than its limit", async () => {
    const semaphore = new AsyncSemaphore(2);
    let active = 0;
    let peak = 0;
    await Promise.all(
      [1, 2, 3, 4, 5].map(() =>
        semaphore.run(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await yieldToEventLoop();
          active -= 1;
        })
      )
    );
    expect(peak).toBe(2);
  });

  it("treats invalid limits as one", () => {
    expect(new AsyncSemaphore(0).limit).toBe(1);
    expect(new AsyncSemaphore(Number.NaN).limit).toBe(1);
  });
});

describe("Lock", () => {
  it("serializes critical sections", async () => {
    const lock = new Lock();
    const events: string[] = [];
    await Promise.all(
      ["a", "b"].map((name) =>
        lock.withLock(async () => {
          events.push(`${name}:start`);
          await yieldToEventLoop();
          events.push(`${name}:end`);
        })
      )
    );
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("releases after a failing section", async () => {
    const lock = new Lock();
    await expect(
      lock.withLock(() => {
        throw new Error("inside");
      })
    ).rejects.toThrow("inside");
    expect(await lock.withLock(() => 7)).toBe(7);
  });
});

describe("concurrentPerform", () => {
  it("runs every iteration", async () => {
    const seen: number[] = [];
    await concurrentPerform(4, async (index) => {
      await yieldToEventLoop();
      seen.push(index);
    });
    expect(seen.sort()).toEqual([0, 1, 2, 3]);
  });

  it("waits for all workers before rethrowing the first failure", async () => {
    const finished: number[] = [];
    await expect(
      concurrentPerform(3, async (index) => {
        if (index === 0) throw new Error("worker 0");
        await yieldToEventLoop();
        finished.push(index);
      })
    ).rejects.toThrow("worker 0");
    expect(finished.sort()).toEqual([1, 2]);
  });
});

describe("concurrentForEach", () => {
  it("stops starting new work after a failure", async () => {
    const started: string[] = [];
    await expect(
      concurrentForEach(["a", "b", "c"], 1, async (item) => {
        started.push(item);
        if (item === "a") throw new Error("a failed");
      })
    ).rejects.toThrow("a failed");
    expect(started).toEqual(["a"]);
  });

  it("visits every item when nothing fails", async () => {
    const visited: number[] = [];
    await concurrentForEach([10, 20, 30], 2, async (item, index) => {
      visited[index] = item;
    });
    expect(visited).toEqual([10, 20, 30]);
  });
});
