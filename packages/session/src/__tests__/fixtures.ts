/**
 * Shared test fixtures
 */

import jwt from 'jsonwebtoken';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Logger } from '../logger';

export const BASE_URL = 'https://api.test.local/api';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: unknown;
}

export type Handler = (request: RecordedRequest, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * In-process stand-in for the backend. Every call is recorded with its
 * path relative to the host and its parsed JSON body.
 */
export function createFakeFetch(handler: Handler) {
  const calls: RecordedRequest[] = [];
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const rawBody = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      headers,
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    calls.push(request);
    return handler(request, init);
  });
  return { fetch: fetchMock, calls };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

/**
 * Signed JWT whose `exp` is `secondsFromNow` after `now`
 */
export function makeToken(secondsFromNow: number, now: number = Date.now()): string {
  return jwt.sign({ exp: Math.floor(now / 1000) + secondsFromNow, sub: 'user-1' }, 'test-secret');
}

export type TestLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function createTestLogger(): TestLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

/**
 * Promise with its resolve handle exposed
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
