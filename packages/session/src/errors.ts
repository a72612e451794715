/**
 * Evolve Session Error Classes
 * @evolve/session
 *
 * Typed error hierarchy for the request and session layers.
 * Only SessionExpiredError carries the meaning "the session is gone".
 */

import { errorBodySchema, parseJson } from './schemas';

/**
 * Discriminator carried by every ApiError
 */
export type ApiErrorCode =
  | 'INVALID_URL'
  | 'REQUEST_FAILED'
  | 'INVALID_RESPONSE'
  | 'DECODING_ERROR'
  | 'ENCODING_ERROR'
  | 'UNAUTHORIZED'
  | 'SESSION_EXPIRED'
  | 'SERVER_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'CUSTOM';

/**
 * Base error class for all session SDK errors
 */
export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly statusCode?: number;

  constructor(message: string, code: ApiErrorCode, statusCode?: number) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = statusCode;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Endpoint could not be turned into a URL
 */
export class InvalidURLError extends ApiError {
  readonly url: string;

  constructor(url: string) {
    super(`Invalid URL: ${url}`, 'INVALID_URL');
    this.name = 'InvalidURLError';
    this.url = url;
  }
}

/**
 * Transport-level failure - connection refused, DNS, timeout
 */
export class RequestFailedError extends ApiError {
  constructor(message: string = 'Network request failed') {
    super(message, 'REQUEST_FAILED');
    this.name = 'RequestFailedError';
  }
}

/**
 * Response arrived but could not be read as an HTTP response body
 */
export class InvalidResponseError extends ApiError {
  constructor(message: string = 'Invalid response') {
    super(message, 'INVALID_RESPONSE');
    this.name = 'InvalidResponseError';
  }
}

/**
 * Response body is not JSON or does not match the expected shape
 */
export class DecodingError extends ApiError {
  constructor(message: string, statusCode?: number) {
    super(message, 'DECODING_ERROR', statusCode);
    this.name = 'DecodingError';
  }
}

/**
 * Request body could not be serialized
 */
export class EncodingError extends ApiError {
  constructor(message: string) {
    super(message, 'ENCODING_ERROR');
    this.name = 'EncodingError';
  }
}

/**
 * Explicit 401 on a request that does not take part in the refresh protocol
 */
export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Definitive authorization failure. The session has been cleared by the time
 * a caller sees this error; route the user back to sign-in.
 */
export class SessionExpiredError extends ApiError {
  constructor(message: string = 'Session expired') {
    super(message, 'SESSION_EXPIRED', 401);
    this.name = 'SessionExpiredError';
  }
}

/**
 * Any other non-2xx response
 */
export class ServerError extends ApiError {
  readonly body: string;

  constructor(statusCode: number, body: string = '', message?: string) {
    super(message ?? `Request failed with status ${statusCode}`, 'SERVER_ERROR', statusCode);
    this.name = 'ServerError';
    this.body = body;
  }
}

/**
 * Free-form failure raised by the SDK itself
 */
export class CustomError extends ApiError {
  constructor(message: string) {
    super(message, 'CUSTOM');
    this.name = 'CustomError';
  }
}

/**
 * Configuration error - invalid SDK configuration
 */
export class ConfigurationError extends ApiError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isSessionExpiredError(error: unknown): error is SessionExpiredError {
  return error instanceof SessionExpiredError;
}

export function isUnauthorizedError(error: unknown): error is UnauthorizedError {
  return error instanceof UnauthorizedError;
}

/**
 * Errors that say nothing about the validity of the session
 */
export function isTransportError(error: unknown): boolean {
  return (
    error instanceof RequestFailedError ||
    error instanceof InvalidResponseError ||
    error instanceof InvalidURLError
  );
}

// ============================================================================
// Error Factory
// ============================================================================

/**
 * Create appropriate error from a non-2xx response.
 * The backend puts the reason in `detail` or `error`.
 */
export function createErrorFromResponse(statusCode: number, body: string): ApiError {
  let message: string | undefined;
  const json = parseJson(body);
  if (json.ok) {
    const parsed = errorBodySchema.safeParse(json.value);
    if (parsed.success) {
      message = parsed.data.detail ?? parsed.data.error;
    }
  }

  if (statusCode === 401) {
    return new UnauthorizedError(message);
  }
  return new ServerError(statusCode, body, message);
}

/**
 * Normalize anything thrown into an ApiError
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof Error) {
    return new CustomError(error.message);
  }
  return new CustomError(String(error));
}
