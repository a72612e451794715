/**
 * Evolve Session SDK
 * @evolve/session
 *
 * Headless client session layer: credential persistence, authenticated
 * requests with refresh-and-retry, single-flight token refresh and
 * background renewal.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { createSessionManager, FileStorage, isSessionExpiredError } from '@evolve/session';
 *
 * const session = createSessionManager({
 *   baseUrl: 'https://api.example.com/api',
 *   storage: new FileStorage('./.evolve/credentials.json'),
 * });
 *
 * await session.restoreSession();
 *
 * try {
 *   const res = await session.http.execute('/workouts/');
 * } catch (error) {
 *   if (isSessionExpiredError(error)) {
 *     // back to sign-in
 *   }
 * }
 * ```
 */

// Session
export { SessionManager, createSessionManager } from './session-manager';

// Requests
export { RequestExecutor } from './request-executor';
export type { RequestExecutorConfig, SessionAccess } from './request-executor';

// Refresh
export { RefreshCoordinator } from './refresh-coordinator';
export { RenewalMonitor } from './renewal-monitor';
export type { RenewalMonitorOptions, RenewalTarget } from './renewal-monitor';
export { decodeToken, getTokenExpiry, getTimeUntilExpiry } from './token';

// Persistence
export { KeyValueCredentialStore, createCredentialStore } from './credential-store';
export type { CredentialStore } from './credential-store';
export { MemoryStorage, FileStorage, CustomStorage, STORAGE_KEYS } from './storage';
export type { FileStorageOptions, SecretStoreFunctions } from './storage';

// Configuration
export {
  resolveConfig,
  loadConfigFromEnv,
  DEFAULT_TIMEOUT,
  DEFAULT_RENEWAL_INTERVAL,
  DEFAULT_RENEWAL_THRESHOLD,
} from './config';
export type { SessionConfig, ResolvedSessionConfig, ResolvedRenewalConfig } from './config';

// Logging
export { createConsoleLogger, childLogger } from './logger';
export type { Logger } from './logger';

// Errors
export {
  ApiError,
  InvalidURLError,
  RequestFailedError,
  InvalidResponseError,
  DecodingError,
  EncodingError,
  UnauthorizedError,
  SessionExpiredError,
  ServerError,
  CustomError,
  ConfigurationError,
  // Type guards
  isApiError,
  isSessionExpiredError,
  isUnauthorizedError,
  isTransportError,
  // Factory
  createErrorFromResponse,
  toApiError,
} from './errors';
export type { ApiErrorCode } from './errors';

// Schemas
export {
  sessionUserSchema,
  refreshResponseSchema,
  sendOtpResponseSchema,
  verifyOtpResponseSchema,
} from './schemas';

// Types
export type {
  SessionUser,
  KeyValueStorage,
  StoredCredentials,
  SessionState,
  SessionSnapshot,
  RefreshFailureReason,
  RefreshOutcome,
  HttpMethod,
  ExecuteOptions,
  ApiResponse,
  OtpRequestResult,
  OtpLoginData,
  UserUpdate,
  SessionEvent,
  SessionEventCallback,
} from './types';
