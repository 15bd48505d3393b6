/**
 * DocumentStack SDK Error Classes
 */

import type { ApiErrorBody } from './types';
import { parseIntegerHeader } from './headers';

export type ErrorKind =
  | 'configuration'
  | 'validation'
  | 'network'
  | 'timeout'
  | 'api'
  | 'rate_limit';

export type StatusCategory =
  | 'validation'
  | 'authentication'
  | 'forbidden'
  | 'not_found'
  | 'rate_limit'
  | 'server';

// ============ Status Categories ============

export const isValidationStatus = (status: number): boolean => status === 400;
export const isAuthenticationStatus = (status: number): boolean => status === 401;
export const isForbiddenStatus = (status: number): boolean => status === 403;
export const isNotFoundStatus = (status: number): boolean => status === 404;
export const isRateLimitStatus = (status: number): boolean => status === 429;
export const isServerErrorStatus = (status: number): boolean => status >= 500;

/**
 * Map an HTTP status code to its named category, if it has one
 */
export function statusCategory(status: number): StatusCategory | undefined {
  if (isValidationStatus(status)) return 'validation';
  if (isAuthenticationStatus(status)) return 'authentication';
  if (isForbiddenStatus(status)) return 'forbidden';
  if (isNotFoundStatus(status)) return 'not_found';
  if (isRateLimitStatus(status)) return 'rate_limit';
  if (isServerErrorStatus(status)) return 'server';
  return undefined;
}

// ============ Error Classes ============

/**
 * Base class for all DocumentStack SDK errors. Narrow on `kind`.
 */
export abstract class DocumentStackError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentStackError';

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid client configuration (e.g. missing API key)
 */
export class ConfigurationError extends DocumentStackError {
  readonly kind = 'configuration' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Request rejected locally before anything was sent
 */
export class ValidationError extends DocumentStackError {
  readonly kind = 'validation' as const;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Network error (connection issues, unreadable body, unserializable payload)
 */
export class NetworkError extends DocumentStackError {
  readonly kind = 'network' as const;

  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'NetworkError';
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends DocumentStackError {
  readonly kind = 'timeout' as const;
  /** Configured timeout in seconds */
  readonly timeout: number;

  constructor(timeout: number) {
    super(`request timed out after ${timeout} seconds`);
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Non-200 response from the API
 */
export class ApiError extends DocumentStackError {
  readonly kind = 'api' as const;
  /** HTTP status code */
  readonly status: number;
  /** Error code from API */
  readonly code: string;
  /** Additional error details from API */
  readonly details?: unknown;

  constructor(status: number, body: ApiErrorBody) {
    super(body.message);
    this.name = 'ApiError';
    this.status = status;
    this.code = body.error;
    this.details = body.details;
  }

  get category(): StatusCategory | undefined {
    return statusCategory(this.status);
  }
}

/**
 * Rate limit error (HTTP 429)
 */
export class RateLimitError extends DocumentStackError {
  readonly kind = 'rate_limit' as const;
  readonly status = 429;
  readonly code: string;
  readonly details?: unknown;
  /** Seconds to wait before retrying (from Retry-After header, 0 if absent) */
  readonly retryAfter: number;

  constructor(body: ApiErrorBody, retryAfter: number) {
    super(body.message);
    this.name = 'RateLimitError';
    this.code = body.error;
    this.details = body.details;
    this.retryAfter = retryAfter;
  }

  get category(): StatusCategory | undefined {
    return statusCategory(this.status);
  }
}

export type DocumentStackFailure =
  | ConfigurationError
  | ValidationError
  | NetworkError
  | TimeoutError
  | ApiError
  | RateLimitError;

export function isDocumentStackError(value: unknown): value is DocumentStackFailure {
  return value instanceof DocumentStackError;
}

// ============ Response Classification ============

/**
 * Build the error for a non-200 response
 */
export async function errorFromResponse(response: Response): Promise<ApiError | RateLimitError> {
  const body = await readErrorBody(response);

  if (isRateLimitStatus(response.status)) {
    return new RateLimitError(body, parseIntegerHeader(response.headers.get('Retry-After')));
  }

  return new ApiError(response.status, body);
}

// HTTP/2 responses carry no reason phrase
const REASON_PHRASES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  402: 'Payment Required',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  408: 'Request Timeout',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  501: 'Not Implemented',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

/**
 * Status line of a response, e.g. "404 Not Found"
 */
export function statusLine(status: number, statusText: string): string {
  const reason = statusText || REASON_PHRASES[status] || '';
  return `${status} ${reason}`.trim();
}

async function readErrorBody(response: Response): Promise<ApiErrorBody> {
  // Non-JSON error body (e.g., HTML error page from a proxy)
  const fallback: ApiErrorBody = {
    error: 'Unknown Error',
    message: statusLine(response.status, response.statusText),
  };

  let parsed: unknown;
  try {
    parsed = JSON.parse(await response.text());
  } catch {
    return fallback;
  }

  // A JSON null decodes to an empty body
  if (parsed === null) {
    return { error: '', message: '' };
  }

  if (!isApiErrorBody(parsed)) {
    return fallback;
  }

  return {
    error: parsed.error ?? '',
    message: parsed.message ?? '',
    details: parsed.details,
  };
}

function isApiErrorBody(value: unknown): value is Partial<ApiErrorBody> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  if ('error' in value && typeof value.error !== 'string') {
    return false;
  }
  if ('message' in value && typeof value.message !== 'string') {
    return false;
  }
  return true;
}
