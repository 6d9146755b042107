import { z } from 'zod';

export class PlaysyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlaysyncError';
  }
}

export type ConfigErrorReason =
  | 'NotFound'
  | 'ParseError'
  | 'Unreadable'
  | 'DuplicateTarget'
  | 'UnknownRule'
  | 'MissingCredentials';

export class ConfigError extends PlaysyncError {
  constructor(message: string, public readonly reason: ConfigErrorReason, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class AuthError extends PlaysyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export class ValidationError extends PlaysyncError {
  constructor(message: string, public readonly playlistId?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// Reasons the YouTube Data API uses for exhausted project quota
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);
// API reasons and OAuth token endpoint errors that mean the credentials no longer work
const AUTH_REASONS = new Set(['authError', 'invalid_grant', 'invalid_client', 'unauthorized_client']);

export class ApiError extends PlaysyncError {
  public readonly status: number | undefined;
  public readonly reason: string | undefined;

  constructor(
    message: string,
    details: { status?: number; reason?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ApiError';
    this.status = details.status;
    this.reason = details.reason;
  }

  get quotaExceeded(): boolean {
    return this.reason !== undefined && QUOTA_REASONS.has(this.reason);
  }

  get authFailure(): boolean {
    return this.status === 401 || (this.reason !== undefined && AUTH_REASONS.has(this.reason));
  }

  get notFound(): boolean {
    return this.status === 404;
  }

  /**
   * Transport failures, server errors and per-user rate limiting are worth
   * another attempt. Quota, auth and other client errors are not.
   */
  get retryable(): boolean {
    if (this.quotaExceeded || this.authFailure) return false;
    if (this.reason !== undefined && RATE_LIMIT_REASONS.has(this.reason)) return true;
    if (this.status === undefined) return true;
    return this.status >= 500;
  }
}

const GaxiosErrorShape = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  status: z.number().optional(),
  response: z
    .object({
      status: z.number().optional(),
      data: z.unknown()
    })
    .optional()
});

const GoogleErrorBody = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional()
  })
});

// Body of a failed OAuth token refresh, e.g. { error: 'invalid_grant' }
const TokenErrorBody = z.object({
  error: z.string(),
  error_description: z.string().optional()
});

/**
 * Normalize whatever googleapis threw into an ApiError carrying the HTTP
 * status and the first error reason from the response body.
 */
export function toApiError(error: unknown, operation: string): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const shape = GaxiosErrorShape.safeParse(error);
  if (!shape.success) {
    return new ApiError(`${operation} failed: ${message}`, { cause: error });
  }

  const body = GoogleErrorBody.safeParse(shape.data.response?.data);
  const bodyError = body.success ? body.data.error : undefined;
  const tokenError = TokenErrorBody.safeParse(shape.data.response?.data);
  const tokenFailure = tokenError.success ? tokenError.data : undefined;
  const status =
    shape.data.response?.status ??
    shape.data.status ??
    (typeof shape.data.code === 'number' ? shape.data.code : undefined) ??
    bodyError?.code;

  return new ApiError(`${operation} failed: ${bodyError?.message ?? tokenFailure?.error_description ?? message}`, {
    status,
    reason: bodyError?.errors?.[0]?.reason ?? tokenFailure?.error,
    cause: error
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
