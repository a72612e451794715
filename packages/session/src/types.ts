/**
 * Evolve Session Types
 * @evolve/session
 */

import type { ApiError } from './errors';
import type { SessionUser } from './schemas';

export type { SessionUser } from './schemas';

// ============================================================================
// Storage
// ============================================================================

/**
 * Key-value storage interface - implement for custom storage
 */
export interface KeyValueStorage {
  get(key: string): string | null | Promise<string | null>;
  set(key: string, value: string): void | Promise<void>;
  remove(key: string): void | Promise<void>;
}

/**
 * What the credential store holds. `null` means the entry is absent.
 */
export interface StoredCredentials {
  user: SessionUser | null;
  accessToken: string | null;
  refreshToken: string | null;
}

// ============================================================================
// Session
// ============================================================================

/**
 * `authenticated` requires a user and a refresh token; the access token
 * may be missing while the first refresh after restore is running.
 */
export type SessionState = 'logged_out' | 'authenticated';

/**
 * Read-only copy of the in-memory session
 */
export interface SessionSnapshot extends StoredCredentials {
  state: SessionState;
}

export type RefreshFailureReason = 'no_session' | 'rejected' | 'failed' | 'discarded';

/**
 * Result shared by every caller waiting on the same refresh
 */
export type RefreshOutcome =
  | {
      success: true;
      accessToken: string;
      /** Present only when the server rotated the refresh token */
      refreshToken?: string;
    }
  | {
      success: false;
      reason: RefreshFailureReason;
      error: ApiError;
    };

// ============================================================================
// HTTP
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ExecuteOptions {
  method?: HttpMethod;
  body?: unknown;
  /** Attach the bearer token and take part in refresh-and-retry (default: true) */
  requiresAuth?: boolean;
}

/**
 * Raw 2xx response
 */
export interface ApiResponse {
  statusCode: number;
  body: string;
}

// ============================================================================
// Phone / OTP sign-in
// ============================================================================

export interface OtpRequestResult {
  message: string;
  /** Only returned by servers running in test mode */
  otpCode: string | null;
}

export interface OtpLoginData {
  phone: string;
  otp: string;
  firstName: string;
  lastName: string;
}

/**
 * Partial profile update sent as-is to the user endpoint
 */
export type UserUpdate = Record<string, unknown>;

// ============================================================================
// Events
// ============================================================================

export type SessionEvent =
  | { type: 'SIGNED_IN'; user: SessionUser }
  | { type: 'SIGNED_OUT' }
  | { type: 'SESSION_RESTORED'; user: SessionUser }
  | { type: 'TOKEN_REFRESHED' }
  | { type: 'USER_UPDATED'; user: SessionUser }
  | { type: 'SESSION_EXPIRED' };

export type SessionEventCallback = (event: SessionEvent) => void;
