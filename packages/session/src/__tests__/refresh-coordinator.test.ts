/**
 * Refresh Coordinator Property Tests
 * @evolve/session
 *
 * Any number of concurrent refresh requests SHALL result in exactly one
 * refresh operation, and every caller SHALL receive its outcome.
 */

import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';
import { RefreshCoordinator } from '../refresh-coordinator';
import { deferred } from './fixtures';

describe('RefreshCoordinator', () => {
  it('should run one operation for concurrent callers', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 25 }), async callers => {
        const coordinator = new RefreshCoordinator<string>();
        const gate = deferred<string>();
        const operation = vi.fn(() => gate.promise);

        const results = Array.from({ length: callers }, () => coordinator.performRefresh(operation));
        expect(coordinator.isRefreshing).toBe(true);
        expect(coordinator.pendingCount).toBe(callers - 1);

        gate.resolve('token-1');
        const values = await Promise.all(results);

        return operation.mock.calls.length === 1 && values.every(value => value === 'token-1');
      }),
      { numRuns: 25 }
    );
  });

  it('should reject every waiter with the same error', async () => {
    const coordinator = new RefreshCoordinator<string>();
    const gate = deferred<string>();
    const failure = new Error('network down');

    const results = [1, 2, 3].map(() => coordinator.performRefresh(() => gate.promise));
    gate.reject(failure);

    const settled = await Promise.allSettled(results);
    expect(settled).toEqual([
      { status: 'rejected', reason: failure },
      { status: 'rejected', reason: failure },
      { status: 'rejected', reason: failure },
    ]);
    expect(coordinator.isRefreshing).toBe(false);
  });

  it('should start a new operation once the previous one settled', async () => {
    const coordinator = new RefreshCoordinator<number>();
    let count = 0;
    const operation = vi.fn(async () => ++count);

    expect(await coordinator.performRefresh(operation)).toBe(1);
    expect(await coordinator.performRefresh(operation)).toBe(2);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should settle waiters in arrival order', async () => {
    const coordinator = new RefreshCoordinator<string>();
    const gate = deferred<string>();
    const order: number[] = [];

    const starter = coordinator.performRefresh(() => gate.promise);
    const waiters = [1, 2, 3, 4].map(n => coordinator.performRefresh(() => gate.promise).then(() => order.push(n)));

    gate.resolve('ok');
    await Promise.all([starter, ...waiters]);

    expect(order).toEqual([1, 2, 3, 4]);
    expect(coordinator.pendingCount).toBe(0);
  });

  it('should not hand a finished outcome to callers of the next cycle', async () => {
    const coordinator = new RefreshCoordinator<string>();
    const firstGate = deferred<string>();
    const secondGate = deferred<string>();

    const first = coordinator.performRefresh(() => firstGate.promise);
    firstGate.resolve('cycle-1');
    expect(await first).toBe('cycle-1');

    const second = coordinator.performRefresh(() => secondGate.promise);
    const joined = coordinator.performRefresh(() => secondGate.promise);
    secondGate.resolve('cycle-2');

    expect(await Promise.all([second, joined])).toEqual(['cycle-2', 'cycle-2']);
  });
});
