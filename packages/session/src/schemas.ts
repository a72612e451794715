/**
 * Wire and persistence schemas
 * @evolve/session
 */

import { z } from 'zod';

// ============================================================================
// User
// ============================================================================

/**
 * Logged-in user profile. Only `id` is interpreted by the session layer;
 * every other field is carried through untouched.
 */
export const sessionUserSchema = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

export type SessionUser = z.infer<typeof sessionUserSchema>;

// ============================================================================
// Token refresh
// ============================================================================

/** `refresh` is present only when the server rotates refresh tokens */
export const refreshResponseSchema = z.object({
  access: z.string().min(1),
  refresh: z.string().min(1).optional(),
});

// ============================================================================
// Phone / OTP sign-in
// ============================================================================

export const sendOtpResponseSchema = z.object({
  message: z.string(),
  otp_code: z.string().nullish(),
});

export const verifyOtpResponseSchema = z.object({
  message: z.string().optional(),
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  user: sessionUserSchema,
});

// ============================================================================
// Errors
// ============================================================================

export const errorBodySchema = z.object({
  detail: z.string().optional(),
  error: z.string().optional(),
});

// ============================================================================
// Helpers
// ============================================================================

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * JSON.parse without throwing
 */
export function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Flatten zod issues into one line for error messages
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
