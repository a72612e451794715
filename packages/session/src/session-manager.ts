/**
 * Session Manager
 * @evolve/session
 *
 * Single owner of the authenticated session. Every change to the user,
 * access token or refresh token goes through here, in memory first and
 * then to the credential store in mutation order.
 *
 * @example
 * ```typescript
 * import { createSessionManager } from '@evolve/session';
 *
 * const session = createSessionManager({ baseUrl: 'https://api.example.com/api' });
 *
 * await session.restoreSession();
 * if (!session.isAuthenticated()) {
 *   await session.requestOtp('+15555550100');
 *   await session.loginWithOtp({ phone: '+15555550100', otp: '123456', firstName: 'Ada', lastName: 'Byron' });
 * }
 *
 * const workouts = await session.http.execute('/workouts/');
 * ```
 */

import type { ResolvedSessionConfig, SessionConfig } from './config';
import { resolveConfig } from './config';
import { createCredentialStore } from './credential-store';
import type { CredentialStore } from './credential-store';
import { CustomError, SessionExpiredError, UnauthorizedError, toApiError } from './errors';
import { childLogger, createConsoleLogger } from './logger';
import type { Logger } from './logger';
import { RefreshCoordinator } from './refresh-coordinator';
import { RenewalMonitor } from './renewal-monitor';
import { RequestExecutor } from './request-executor';
import type { SessionAccess } from './request-executor';
import {
  refreshResponseSchema,
  sendOtpResponseSchema,
  sessionUserSchema,
  verifyOtpResponseSchema,
} from './schemas';
import type { SessionUser } from './schemas';
import type {
  OtpLoginData,
  OtpRequestResult,
  RefreshOutcome,
  SessionEvent,
  SessionEventCallback,
  SessionSnapshot,
  SessionState,
  UserUpdate,
} from './types';

export class SessionManager implements SessionAccess {
  private readonly config: ResolvedSessionConfig;
  private readonly logger: Logger;
  private readonly store: CredentialStore;
  private readonly coordinator: RefreshCoordinator<RefreshOutcome>;
  private readonly monitor: RenewalMonitor;

  /** Authenticated HTTP for application endpoints */
  readonly http: RequestExecutor;

  private user: SessionUser | null = null;
  private accessToken: string | null = null;
  private refreshToken: string | null = null;

  /** Bumped whenever the session is replaced or ended */
  private generation = 0;
  private persistQueue: Promise<void> = Promise.resolve();
  private background: Set<Promise<void>> = new Set();
  private listeners: Set<SessionEventCallback> = new Set();

  constructor(config: SessionConfig) {
    this.config = resolveConfig(config);
    this.logger = config.logger ?? createConsoleLogger('[Evolve]', this.config.debug);

    this.store =
      config.credentialStore ?? createCredentialStore(config.storage, childLogger(this.logger, 'CredentialStore'));
    this.coordinator = new RefreshCoordinator(childLogger(this.logger, 'RefreshCoordinator'));
    this.http = new RequestExecutor({
      baseUrl: this.config.baseUrl,
      session: this,
      timeout: this.config.timeout,
      headers: this.config.headers,
      fetch: config.fetch,
      logger: childLogger(this.logger, 'RequestExecutor'),
    });
    this.monitor = new RenewalMonitor({
      intervalMs: this.config.renewal.intervalMs,
      thresholdMs: this.config.renewal.thresholdMs,
      target: this,
      logger: childLogger(this.logger, 'RenewalMonitor'),
    });
  }

  // ============================================================================
  // State
  // ============================================================================

  getUser(): SessionUser | null {
    return this.user;
  }

  getAccessToken(): string | null {
    return this.accessToken;
  }

  getState(): SessionState {
    return this.user !== null && this.refreshToken !== null ? 'authenticated' : 'logged_out';
  }

  isAuthenticated(): boolean {
    return this.getState() === 'authenticated';
  }

  getSnapshot(): SessionSnapshot {
    return {
      state: this.getState(),
      user: this.user,
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
    };
  }

  /** True while the background renewal monitor is scheduled */
  get isMonitoring(): boolean {
    return this.monitor.running;
  }

  /**
   * Subscribe to session changes
   *
   * @returns Unsubscribe function
   */
  onSessionChange(callback: SessionEventCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  // ============================================================================
  // Sign-in / Sign-out
  // ============================================================================

  /**
   * Start a session with credentials obtained from a sign-in endpoint
   */
  async login(user: SessionUser, accessToken: string, refreshToken: string): Promise<void> {
    this.generation++;
    this.user = user;
    this.accessToken = accessToken;
    this.refreshToken = refreshToken;
    const persisted = this.persist();

    this.startMonitor();
    this.logger.info(`Signed in as user ${user.id}`);
    this.emit({ type: 'SIGNED_IN', user });

    await persisted;
  }

  /**
   * Send a one-time code to `phone`
   */
  async requestOtp(phone: string): Promise<OtpRequestResult> {
    const response = await this.http.request('/send-otp/', sendOtpResponseSchema, {
      method: 'POST',
      body: { phone },
      requiresAuth: false,
    });
    return { message: response.message, otpCode: response.otp_code ?? null };
  }

  /**
   * Verify the one-time code and start the session it returns
   */
  async loginWithOtp(data: OtpLoginData): Promise<SessionUser> {
    const response = await this.http.request('/verify-otp/', verifyOtpResponseSchema, {
      method: 'POST',
      body: {
        phone: data.phone,
        otp: data.otp,
        firstName: data.firstName,
        lastName: data.lastName,
      },
      requiresAuth: false,
    });
    await this.login(response.user, response.access_token, response.refresh_token);
    return response.user;
  }

  /**
   * End the session. The server is told to revoke the refresh token in the
   * background; that call never delays or fails the logout.
   */
  async logout(): Promise<void> {
    if (!this.hasSessionData()) {
      // Nothing in memory, but the store may still hold a session from a previous run
      await this.clearLocal();
      return;
    }
    this.logger.info('Signing out');
    await this.endSession();
  }

  /**
   * Generation of the current session. Changes on every login, logout and
   * restore, so a caller can tell whether the session it started with is
   * still the one in place.
   */
  getSessionGeneration(): number {
    return this.generation;
  }

  /**
   * Clear the session after a definitive authorization failure. When
   * `generation` is given and a different session is now in place, the
   * failure belongs to the old one and nothing happens.
   */
  async expireSession(generation?: number): Promise<void> {
    if (generation !== undefined && generation !== this.generation) {
      this.logger.debug('Authorization failure from an earlier session, keeping the current one');
      return;
    }
    if (!this.hasSessionData()) {
      await this.clearLocal();
      return;
    }
    this.logger.info('Session expired, signing out');
    const ended = this.endSession();
    this.emit({ type: 'SESSION_EXPIRED' });
    await ended;
  }

  /**
   * Load persisted credentials. A stored user with a refresh token becomes
   * the session; anything else found in the store is cleared.
   */
  async restoreSession(): Promise<SessionUser | null> {
    if (this.isAuthenticated()) {
      return this.user;
    }

    const generation = this.generation;
    const stored = await this.store.load();
    if (generation !== this.generation) {
      // Signed in or out while loading
      return this.user;
    }

    if (stored.user === null || stored.refreshToken === null) {
      if (stored.user !== null || stored.accessToken !== null || stored.refreshToken !== null) {
        this.logger.warn('Stored session is incomplete, clearing it');
      }
      this.generation++;
      this.user = null;
      this.accessToken = null;
      this.refreshToken = null;
      await this.persist();
      return null;
    }

    this.generation++;
    this.user = stored.user;
    this.accessToken = stored.accessToken;
    this.refreshToken = stored.refreshToken;
    this.startMonitor();
    this.logger.info(`Restored session for user ${stored.user.id}`);
    this.emit({ type: 'SESSION_RESTORED', user: stored.user });

    if (this.accessToken === null) {
      await this.refreshAccessToken();
    }
    return this.user;
  }

  // ============================================================================
  // Token Refresh
  // ============================================================================

  /**
   * Refresh the access token. Concurrent callers share one server call.
   */
  refresh(): Promise<RefreshOutcome> {
    return this.coordinator.performRefresh(() => this.performTokenRefresh());
  }

  async refreshAccessToken(): Promise<boolean> {
    const outcome = await this.refresh();
    return outcome.success;
  }

  // ============================================================================
  // User
  // ============================================================================

  /**
   * Reload the user record from the server
   */
  async fetchUser(): Promise<SessionUser> {
    const user = this.requireUser();
    return this.syncUser(user, {});
  }

  /**
   * Apply a partial profile update and store the result
   */
  async updateUser(changes: UserUpdate): Promise<SessionUser> {
    const user = this.requireUser();
    return this.syncUser(user, { method: 'PATCH', body: changes });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Resolves once queued writes and background server calls have finished
   */
  async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(this.background);
    }
    await this.persistQueue;
  }

  /**
   * Stop background renewal. The session itself is kept.
   */
  dispose(): void {
    this.monitor.stop();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async performTokenRefresh(): Promise<RefreshOutcome> {
    const generation = this.generation;
    const refreshToken = this.refreshToken;

    if (refreshToken === null) {
      this.logger.debug('No refresh token held');
      if (this.user !== null) {
        const cleared = this.clearLocal();
        this.emit({ type: 'SIGNED_OUT' });
        await cleared;
      }
      return { success: false, reason: 'no_session', error: new SessionExpiredError('Not signed in') };
    }

    try {
      const response = await this.http.request('/token/refresh/', refreshResponseSchema, {
        method: 'POST',
        body: { refresh: refreshToken },
        requiresAuth: false,
      });

      if (generation !== this.generation) {
        this.logger.debug('Session changed during refresh, discarding new tokens');
        return this.discarded();
      }

      this.accessToken = response.access;
      if (response.refresh !== undefined) {
        this.refreshToken = response.refresh;
      }
      const persisted = this.persist();
      this.logger.debug(`Token refreshed (refresh token rotated: ${response.refresh !== undefined})`);
      this.emit({ type: 'TOKEN_REFRESHED' });
      await persisted;

      return response.refresh !== undefined
        ? { success: true, accessToken: response.access, refreshToken: response.refresh }
        : { success: true, accessToken: response.access };
    } catch (error) {
      if (generation !== this.generation) {
        return this.discarded();
      }

      if (error instanceof UnauthorizedError) {
        this.logger.info('Refresh token rejected, clearing session');
        const cleared = this.clearLocal();
        this.emit({ type: 'SIGNED_OUT' });
        this.emit({ type: 'SESSION_EXPIRED' });
        await cleared;
        return { success: false, reason: 'rejected', error: new SessionExpiredError('Refresh token rejected') };
      }

      const apiError = toApiError(error);
      this.logger.warn(`Token refresh failed: ${apiError.message}`);
      return { success: false, reason: 'failed', error: apiError };
    }
  }

  private discarded(): RefreshOutcome {
    return {
      success: false,
      reason: 'discarded',
      error: new SessionExpiredError('Session ended during token refresh'),
    };
  }

  private requireUser(): SessionUser {
    if (this.user === null) {
      throw new CustomError('User not logged in');
    }
    return this.user;
  }

  private async syncUser(
    user: SessionUser,
    options: { method?: 'PATCH'; body?: UserUpdate }
  ): Promise<SessionUser> {
    const generation = this.generation;
    const updated = await this.http.request(`/users/${encodeURIComponent(user.id)}/`, sessionUserSchema, options);

    if (generation !== this.generation) {
      this.logger.debug('Session changed while syncing user, not storing the result');
      return updated;
    }

    this.user = updated;
    const persisted = this.persist();
    this.emit({ type: 'USER_UPDATED', user: updated });
    await persisted;
    return updated;
  }

  private hasSessionData(): boolean {
    return this.user !== null || this.accessToken !== null || this.refreshToken !== null;
  }

  private async endSession(): Promise<void> {
    const refreshToken = this.refreshToken;
    const cleared = this.clearLocal();
    this.emit({ type: 'SIGNED_OUT' });

    if (refreshToken !== null) {
      this.track(this.revokeOnServer(refreshToken));
    }
    await cleared;
  }

  /**
   * Drop the in-memory session and queue the matching store clear
   */
  private clearLocal(): Promise<void> {
    this.generation++;
    this.user = null;
    this.accessToken = null;
    this.refreshToken = null;
    this.monitor.stop();
    return this.persist();
  }

  /**
   * Queue a write of the current in-memory state. Writes run one at a
   * time in the order they were queued.
   */
  private persist(): Promise<void> {
    const { user, accessToken, refreshToken } = this;
    const write = this.persistQueue.then(() =>
      user === null ? this.store.clear() : this.store.save(user, accessToken, refreshToken)
    );
    this.persistQueue = write.catch(error => {
      this.logger.error('Failed to persist session', error);
    });
    return this.persistQueue;
  }

  private async revokeOnServer(refreshToken: string): Promise<void> {
    try {
      await this.http.execute('/auth/logout/', {
        method: 'POST',
        body: { refresh: refreshToken },
        requiresAuth: false,
      });
      this.logger.debug('Refresh token revoked on server');
    } catch (error) {
      this.logger.warn(`Server logout failed: ${toApiError(error).message}`);
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch(error => {
        this.logger.error('Background task failed', error);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private startMonitor(): void {
    if (this.config.renewal.enabled) {
      this.monitor.start();
    }
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Session listener error', error);
      }
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new session manager
 */
export function createSessionManager(config: SessionConfig): SessionManager {
  return new SessionManager(config);
}
