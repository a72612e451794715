/**
 * Refresh Coordinator
 * @evolve/session
 *
 * Single-flight wrapper around the token refresh call: at most one
 * operation runs at a time and every caller that arrives while it runs
 * receives that operation's outcome.
 */

import type { Logger } from './logger';

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export class RefreshCoordinator<T> {
  private refreshing = false;
  private waiters: Array<Waiter<T>> = [];
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /** True while an operation is in flight */
  get isRefreshing(): boolean {
    return this.refreshing;
  }

  /** Callers currently waiting on the in-flight operation */
  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Run `operation` unless one is already in flight, in which case wait
   * for it. Waiters are settled in arrival order, before the caller that
   * started the operation. A rejected operation rejects every waiter with
   * the same reason.
   */
  async performRefresh(operation: () => Promise<T>): Promise<T> {
    if (this.refreshing) {
      this.logger?.debug(`Refresh already in progress, queuing request (${this.waiters.length + 1} waiting)`);
      return new Promise<T>((resolve, reject) => {
        this.waiters.push({ resolve, reject });
      });
    }

    // Flag is set in the same synchronous step as the check above
    this.refreshing = true;
    this.logger?.debug('Starting refresh');

    let settled: Settled<T>;
    try {
      settled = { ok: true, value: await operation() };
    } catch (error) {
      settled = { ok: false, error };
    }

    const waiters = this.waiters;
    this.waiters = [];
    this.refreshing = false;

    for (const waiter of waiters) {
      if (settled.ok) {
        waiter.resolve(settled.value);
      } else {
        waiter.reject(settled.error);
      }
    }

    if (!settled.ok) {
      throw settled.error;
    }
    return settled.value;
  }
}
