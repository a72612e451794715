/**
 * Evolve Session Configuration
 * @evolve/session
 */

import type { CredentialStore } from './credential-store';
import { ConfigurationError } from './errors';
import type { Logger } from './logger';
import { FileStorage } from './storage';
import type { KeyValueStorage } from './types';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TIMEOUT = 30_000;
export const DEFAULT_RENEWAL_INTERVAL = 30 * 60 * 1000; // 30 minutes
export const DEFAULT_RENEWAL_THRESHOLD = 15 * 60 * 1000; // 15 minutes

/**
 * Configuration options for SessionManager
 */
export interface SessionConfig {
  /** API base URL, endpoints are appended to it (e.g. https://api.example.com/api) */
  baseUrl: string;
  /** Key-value storage for the default credential store (default: in memory) */
  storage?: KeyValueStorage;
  /** Replaces the default credential store entirely */
  credentialStore?: CredentialStore;
  /** Logger for SDK output (default: console, gated by `debug`) */
  logger?: Logger;
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom headers to include in all requests */
  headers?: Record<string, string>;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Background token renewal */
  renewal?: {
    /** default: true */
    enabled?: boolean;
    /** How often the access token is checked (default: 30 minutes) */
    intervalMs?: number;
    /** Refresh when less than this much lifetime remains (default: 15 minutes) */
    thresholdMs?: number;
  };
}

export interface ResolvedRenewalConfig {
  enabled: boolean;
  intervalMs: number;
  thresholdMs: number;
}

export interface ResolvedSessionConfig {
  baseUrl: string;
  debug: boolean;
  timeout: number;
  headers: Record<string, string>;
  renewal: ResolvedRenewalConfig;
}

/**
 * Validate the configuration and fill in defaults
 */
export function resolveConfig(config: SessionConfig): ResolvedSessionConfig {
  if (!config.baseUrl) {
    throw new ConfigurationError('baseUrl is required');
  }

  let parsed: URL;
  try {
    parsed = new URL(config.baseUrl);
  } catch {
    throw new ConfigurationError(`baseUrl is not a valid URL: ${config.baseUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`baseUrl must use http or https, got ${parsed.protocol}`);
  }

  const timeout = config.timeout ?? DEFAULT_TIMEOUT;
  const intervalMs = config.renewal?.intervalMs ?? DEFAULT_RENEWAL_INTERVAL;
  const thresholdMs = config.renewal?.thresholdMs ?? DEFAULT_RENEWAL_THRESHOLD;

  assertPositive('timeout', timeout);
  assertPositive('renewal.intervalMs', intervalMs);
  if (!Number.isFinite(thresholdMs) || thresholdMs < 0) {
    throw new ConfigurationError(`renewal.thresholdMs must be zero or positive, got ${thresholdMs}`);
  }

  return {
    baseUrl: config.baseUrl.replace(/\/+$/, ''),
    debug: config.debug ?? false,
    timeout,
    headers: { ...config.headers },
    renewal: {
      enabled: config.renewal?.enabled ?? true,
      intervalMs,
      thresholdMs,
    },
  };
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Build a SessionConfig from environment variables:
 *
 * - `EVOLVE_API_URL` (required)
 * - `EVOLVE_DEBUG` - `true` enables debug logging
 * - `EVOLVE_REQUEST_TIMEOUT_MS`
 * - `EVOLVE_CREDENTIALS_FILE` - persist credentials to this JSON file
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const baseUrl = env.EVOLVE_API_URL;
  if (!baseUrl) {
    throw new ConfigurationError('EVOLVE_API_URL is not set');
  }

  const config: SessionConfig = {
    baseUrl,
    debug: env.EVOLVE_DEBUG === 'true',
  };

  if (env.EVOLVE_REQUEST_TIMEOUT_MS) {
    const timeout = Number(env.EVOLVE_REQUEST_TIMEOUT_MS);
    if (Number.isNaN(timeout)) {
      throw new ConfigurationError(
        `EVOLVE_REQUEST_TIMEOUT_MS must be a number, got "${env.EVOLVE_REQUEST_TIMEOUT_MS}"`
      );
    }
    config.timeout = timeout;
  }

  if (env.EVOLVE_CREDENTIALS_FILE) {
    config.storage = new FileStorage(env.EVOLVE_CREDENTIALS_FILE);
  }

  return config;
}
