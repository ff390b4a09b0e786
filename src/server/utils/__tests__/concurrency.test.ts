import { ConcurrencyGate, pLimit } from '../concurrency';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ConcurrencyGate', () => {
  it('rejects a non-positive concurrency', () => {
    expect(() => new ConcurrencyGate(0)).toThrow(TypeError);
    expect(() => pLimit(1.5)).toThrow(TypeError);
  });

  it('never runs more tasks than its concurrency', async () => {
    const gate = pLimit(2);
    const blockers = [deferred(), deferred(), deferred()];
    let running = 0;
    let peak = 0;

    const runs = blockers.map((blocker, index) =>
      gate.run(async () => {
        running++;
        peak = Math.max(peak, running);
        await blocker.promise;
        running--;
        return index;
      })
    );

    await Promise.resolve();
    expect(gate.activeCount).toBe(2);
    expect(gate.pendingCount).toBe(1);

    blockers.forEach((blocker) => blocker.resolve());
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(peak).toBe(2);
    expect(gate.activeCount).toBe(0);
  });

  it('releases its slot when a task throws', async () => {
    const gate = new ConcurrencyGate(1);
    await expect(gate.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(gate.run(async () => 'next')).resolves.toBe('next');
    expect(gate.activeCount).toBe(0);
  });
});
