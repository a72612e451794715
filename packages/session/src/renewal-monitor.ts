/**
 * Background Renewal Monitor
 * @evolve/session
 *
 * Periodically checks the access token and refreshes it before it
 * expires. Never touches session state itself.
 */

import type { Logger } from './logger';
import { getTimeUntilExpiry } from './token';

/**
 * The part of the session the monitor reads and drives
 */
export interface RenewalTarget {
  isAuthenticated(): boolean;
  getAccessToken(): string | null;
  refreshAccessToken(): Promise<boolean>;
}

export interface RenewalMonitorOptions {
  intervalMs: number;
  /** Refresh once the token has less than this long to live */
  thresholdMs: number;
  target: RenewalTarget;
  logger?: Logger;
  now?: () => number;
}

export class RenewalMonitor {
  private readonly intervalMs: number;
  private readonly thresholdMs: number;
  private readonly target: RenewalTarget;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private active = false;

  constructor(options: RenewalMonitorOptions) {
    this.intervalMs = options.intervalMs;
    this.thresholdMs = options.thresholdMs;
    this.target = options.target;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.active;
  }

  /**
   * Start checking every `intervalMs`. No-op when already running.
   */
  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.logger?.debug(`Renewal monitor started (every ${this.intervalMs}ms)`);
    this.schedule();
  }

  stop(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger?.debug('Renewal monitor stopped');
  }

  /**
   * One check. Resolves to false when the session is gone and the
   * monitor should not run again.
   */
  async tick(): Promise<boolean> {
    if (!this.target.isAuthenticated()) {
      this.logger?.debug('No active session, renewal monitor exiting');
      return false;
    }

    const token = this.target.getAccessToken();
    if (token === null) {
      this.logger?.debug('No access token held, refreshing');
      await this.target.refreshAccessToken();
      return true;
    }

    const remaining = getTimeUntilExpiry(token, this.now());
    if (remaining === null) {
      this.logger?.debug('Access token expiry unreadable, skipping check');
      return true;
    }

    if (remaining < this.thresholdMs) {
      this.logger?.debug(`Access token expires in ${Math.round(remaining / 1000)}s, refreshing`);
      const refreshed = await this.target.refreshAccessToken();
      if (!refreshed) {
        this.logger?.warn('Background token renewal failed');
      }
    }
    return true;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().then(
        keepRunning => this.afterTick(keepRunning),
        error => {
          this.logger?.error('Renewal check failed', error);
          this.afterTick(true);
        }
      );
    }, this.intervalMs);
    this.timer.unref();
  }

  private afterTick(keepRunning: boolean): void {
    // stop() and start() during the tick already scheduled the next run
    if (!this.active || this.timer !== null) {
      return;
    }
    if (keepRunning) {
      this.schedule();
    } else {
      this.stop();
    }
  }
}
