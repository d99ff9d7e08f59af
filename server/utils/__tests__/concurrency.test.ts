import { describe, expect, it } from 'vitest';
import { AbortedError, Semaphore } from '../concurrency';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('Semaphore', () => {
  it('never runs more tasks than its capacity', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;
    const gates = [deferred(), deferred(), deferred()];

    const tasks = gates.map((gate) =>
      semaphore.run(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await gate.promise;
        running -= 1;
      }),
    );

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(running).toBe(2);
    gates.forEach((gate) => gate.resolve());
    await Promise.all(tasks);
    expect(peak).toBe(2);
  });

  it('rejects waiters whose signal aborts', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
    release();
    const next = await semaphore.acquire();
    next();
  });
});
