/**
 * Error taxonomy for the HTTP boundary.
 *
 * Source-level failures (transport, retryable status, circuit open, no match)
 * never get here: they are carried as typed results inside the core. Only the
 * codes below reach a client.
 */

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'RATE_LIMIT_EXCEEDED'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'INTERNAL_ERROR';

const HTTP_STATUS: Record<ErrorCode, number> = {
  VALIDATION_FAILED: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  RATE_LIMIT_EXCEEDED: 429,
  EXTERNAL_SERVICE_ERROR: 502,
  INTERNAL_ERROR: 500,
};

export interface ErrorEnvelope {
  error: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  retryAfter?: number;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly details?: Record<string, unknown>;
  readonly retryAfter?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; retryAfter?: number } = {}
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS[code];
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  toJSON(): ErrorEnvelope {
    return errorEnvelope(this.code, this.message, this.details, this.retryAfter);
  }
}

export function errorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  retryAfter?: number
): ErrorEnvelope {
  return {
    error: code,
    message,
    ...(details ? { details } : {}),
    timestamp: new Date().toISOString(),
    ...(retryAfter !== undefined ? { retryAfter } : {}),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
