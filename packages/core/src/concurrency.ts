/**
 * Cooperative concurrency primitives.
 *
 * Workers are async tasks that yield to the event loop between slices of work, so several
 * of them interleave on one thread. Shared accumulators are only touched inside a {@link Lock}.
 */

/**
 * Bounds the number of tasks running at the same time.
 */
export class AsyncSemaphore {
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    this.max = Number.isFinite(max) && max > 0 ? Math.floor(max) : 1;
  }

  get limit(): number {
    return this.max;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    this.active += 1;
    try {
      return await task();
    } finally {
      this.active -= 1;
      const next = this.queue.shift();
      if (next) next();
    }
  }
}

/**
 * Mutual exclusion around async critical sections. Callers are served in FIFO order.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  async withLock<T>(body: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await body();
    } finally {
      release();
    }
  }
}

/**
 * Give other pending workers a chance to run.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Run `body(0..<iterations)` as concurrent workers and wait for all of them.
 *
 * Workers are never cancelled: when one fails the others still run to completion, and the
 * first failure (in completion order) is rethrown afterwards.
 */
export async function concurrentPerform(
  iterations: number,
  body: (index: number) => Promise<void>
): Promise<void> {
  const errors: unknown[] = [];
  const workers: Promise<void>[] = [];
  for (let index = 0; index < iterations; index++) {
    workers.push(
      body(index).catch((error: unknown) => {
        errors.push(error);
      })
    );
  }
  await Promise.all(workers);
  if (errors.length > 0) {
    throw errors[0];
  }
}

/**
 * Apply `body` to every item with at most `limit` tasks in flight.
 *
 * Once any task has failed no new task is started; tasks already running finish. The first
 * failure is rethrown after everything in flight has settled.
 */
export async function concurrentForEach<T>(
  items: readonly T[],
  limit: number,
  body: (item: T, index: number) => Promise<void>
): Promise<void> {
  const semaphore = new AsyncSemaphore(limit);
  let firstError: { error: unknown } | undefined;

  await Promise.all(
    items.map((item, index) =>
      semaphore.run(async () => {
        if (firstError) return;
        try {
          await body(item, index);
        } catch (error) {
          firstError ??= { error };
        }
      })
    )
  );

  if (firstError) {
    throw firstError.error;
  }
}
