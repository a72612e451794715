/**
 * Request Executor
 * @evolve/session
 *
 * Sends API requests, attaches the bearer token and drives the
 * refresh-then-retry-once protocol on 401.
 */

import type { z } from 'zod';
import {
  ApiError,
  DecodingError,
  EncodingError,
  InvalidResponseError,
  InvalidURLError,
  RequestFailedError,
  SessionExpiredError,
  createErrorFromResponse,
} from './errors';
import type { Logger } from './logger';
import { describeIssues, parseJson } from './schemas';
import type { ApiResponse, ExecuteOptions, HttpMethod, RefreshOutcome } from './types';

/**
 * What the executor needs from the session owner
 */
export interface SessionAccess {
  getAccessToken(): string | null;
  /** Changes whenever the session is replaced or ended */
  getSessionGeneration(): number;
  /** Single-flight refresh; every concurrent caller gets the same outcome */
  refresh(): Promise<RefreshOutcome>;
  /**
   * Clear the session after a definitive authorization failure. Idempotent.
   * Ignored when `generation` no longer names the current session.
   */
  expireSession(generation?: number): Promise<void>;
}

export interface RequestExecutorConfig {
  baseUrl: string;
  session: SessionAccess;
  timeout: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  logger?: Logger;
}

interface RawResponse {
  statusCode: number;
  body: string;
}

export class RequestExecutor {
  private readonly baseUrl: string;
  private readonly session: SessionAccess;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  constructor(config: RequestExecutorConfig) {
    this.baseUrl = config.baseUrl;
    this.session = config.session;
    this.timeout = config.timeout;
    this.headers = config.headers ?? {};
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger;
  }

  /**
   * Send a request and return the raw 2xx response.
   *
   * @throws SessionExpiredError when authorization fails after the one retry
   * @throws UnauthorizedError on 401 for requests that do not require auth
   * @throws ServerError on any other non-2xx status
   */
  async execute(endpoint: string, options: ExecuteOptions = {}): Promise<ApiResponse> {
    const { method = 'GET', body, requiresAuth = true } = options;
    const url = this.buildUrl(endpoint);
    const payload = this.encodeBody(body);
    const generation = this.session.getSessionGeneration();

    let token: string | null = null;
    if (requiresAuth) {
      token = this.session.getAccessToken();
      if (token === null) {
        this.logger?.debug(`No access token for ${method} ${url.pathname}, refreshing before sending`);
        token = await this.refreshedToken(generation);
      }
    }

    let response = await this.send(url, method, payload, token);

    if (response.statusCode === 401 && requiresAuth) {
      this.logger?.debug(`401 for ${method} ${url.pathname}, refreshing and retrying once`);
      const retryToken = await this.refreshedToken(generation);
      response = await this.send(url, method, payload, retryToken);

      if (response.statusCode === 401) {
        this.logger?.info(`401 for ${method} ${url.pathname} after retry, session expired`);
        await this.session.expireSession(generation);
        throw new SessionExpiredError();
      }
    }

    if (response.statusCode < 200 || response.statusCode > 299) {
      throw createErrorFromResponse(response.statusCode, response.body);
    }

    return response;
  }

  /**
   * Send a request and decode the JSON body with `schema`.
   * An empty body decodes as `null`.
   *
   * @throws DecodingError when the body is not JSON or does not match
   */
  async request<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const response = await this.execute(endpoint, options);

    let data: unknown = null;
    if (response.body.trim() !== '') {
      const json = parseJson(response.body);
      if (!json.ok) {
        throw new DecodingError(
          `Response from ${endpoint} is not valid JSON: ${json.error.message}`,
          response.statusCode
        );
      }
      data = json.value;
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new DecodingError(
        `Unexpected response from ${endpoint}: ${describeIssues(parsed.error)}`,
        response.statusCode
      );
    }
    return parsed.data;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Token from a fresh refresh. A transport failure is rethrown as-is and
   * leaves the session alone; any other failure ends the session.
   * A discarded outcome belongs to a session that is already gone, so
   * whatever replaced it is left untouched.
   */
  private async refreshedToken(generation: number): Promise<string> {
    const outcome = await this.session.refresh();
    if (outcome.success) {
      return outcome.accessToken;
    }
    if (outcome.reason === 'failed') {
      throw outcome.error;
    }
    if (outcome.reason !== 'discarded') {
      await this.session.expireSession(generation);
    }
    throw outcome.error instanceof SessionExpiredError ? outcome.error : new SessionExpiredError();
  }

  private buildUrl(endpoint: string): URL {
    const raw = `${this.baseUrl}${endpoint}`;
    try {
      return new URL(raw);
    } catch {
      throw new InvalidURLError(raw);
    }
  }

  private encodeBody(body: unknown): string | undefined {
    if (body === undefined) {
      return undefined;
    }
    try {
      return JSON.stringify(body);
    } catch (error) {
      throw new EncodingError(error instanceof Error ? error.message : 'Request body could not be encoded');
    }
  }

  private async send(
    url: URL,
    method: HttpMethod,
    body: string | undefined,
    token: string | null
  ): Promise<RawResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'X-Requested-With': 'XMLHttpRequest',
      ...this.headers,
    };
    if (token !== null) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    this.logger?.debug(`${method} ${url.pathname} ${token !== null ? '(with token)' : '(no auth)'}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body,
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeoutId);
      if (error instanceof ApiError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new RequestFailedError('Request timeout');
      }
      throw new RequestFailedError(error instanceof Error ? error.message : 'Unknown network error');
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (isAbortError(error)) {
        throw new RequestFailedError('Request timeout');
      }
      throw new InvalidResponseError(
        error instanceof Error ? `Failed to read response body: ${error.message}` : 'Failed to read response body'
      );
    } finally {
      clearTimeout(timeoutId);
    }

    this.logger?.debug(`${method} ${url.pathname} -> ${response.status}`);
    return { statusCode: response.status, body: text };
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
