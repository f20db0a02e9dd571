/**
 * Structured error classes for the Pocket API
 */

/** Fallback values when the API omits its error headers */
export const UNKNOWN_ERROR_CODE = 0;
export const UNKNOWN_ERROR_MESSAGE = "Unknown error";

/**
 * Rate limit counters Pocket echoes in X-Limit-* headers
 */
export interface RateLimitInfo {
  userLimit?: number;
  userRemaining?: number;
  userReset?: number;
  keyLimit?: number;
  keyRemaining?: number;
  keyReset?: number;
}

/**
 * Base error class for all Pocket-related errors
 */
export class PocketError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "PocketError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export interface PocketAPIErrorDetails {
  errorCode?: number;
  errorMessage?: string;
  responseBody?: string;
  rateLimit?: RateLimitInfo;
}

/**
 * Non-2xx response. Pocket reports the reason in the X-Error-Code and
 * X-Error headers rather than in the body.
 */
export class PocketAPIError extends PocketError {
  readonly errorCode: number;
  readonly errorMessage: string;
  readonly responseBody?: string;
  readonly rateLimit?: RateLimitInfo;

  constructor(
    public readonly statusCode: number,
    details: PocketAPIErrorDetails = {}
  ) {
    const errorCode = details.errorCode ?? UNKNOWN_ERROR_CODE;
    const errorMessage = details.errorMessage ?? UNKNOWN_ERROR_MESSAGE;
    super(`Pocket API error: ${statusCode} (${errorCode}) ${errorMessage}`, `HTTP_${statusCode}`);
    this.name = "PocketAPIError";
    this.errorCode = errorCode;
    this.errorMessage = errorMessage;
    this.responseBody = details.responseBody;
    this.rateLimit = details.rateLimit;
  }
}

/**
 * 400 - missing or invalid parameters
 */
export class PocketBadRequestError extends PocketAPIError {
  constructor(details: PocketAPIErrorDetails = {}) {
    super(400, details);
    this.name = "PocketBadRequestError";
  }
}

/**
 * 401 - bad consumer key or access token
 */
export class PocketAuthError extends PocketAPIError {
  constructor(details: PocketAPIErrorDetails = {}) {
    super(401, details);
    this.name = "PocketAuthError";
  }
}

/**
 * 403 - missing permission or rate limit hit
 */
export class PocketForbiddenError extends PocketAPIError {
  constructor(details: PocketAPIErrorDetails = {}) {
    super(403, details);
    this.name = "PocketForbiddenError";
  }

  get isRateLimited(): boolean {
    return this.rateLimit?.userRemaining === 0 || this.rateLimit?.keyRemaining === 0;
  }
}

/**
 * 503 - Pocket is down for maintenance
 */
export class PocketUnavailableError extends PocketAPIError {
  constructor(details: PocketAPIErrorDetails = {}) {
    super(503, details);
    this.name = "PocketUnavailableError";
  }
}

export type TransportErrorKind = "network" | "timeout";

/**
 * No HTTP response was obtained
 */
export class PocketTransportError extends PocketError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    cause?: Error
  ) {
    super(message, kind === "timeout" ? "TIMEOUT" : "NETWORK_ERROR", cause);
    this.name = "PocketTransportError";
  }
}

/**
 * 2xx response whose body could not be decoded
 */
export class PocketDecodeError extends PocketError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string,
    cause?: Error
  ) {
    super(message, "DECODE_ERROR", cause);
    this.name = "PocketDecodeError";
  }
}

/**
 * Invalid credentials input or environment configuration
 */
export class PocketConfigError extends PocketError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "PocketConfigError";
  }
}

/**
 * Caller-supplied options that fail validation before a request is made
 */
export class PocketValidationError extends PocketError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "PocketValidationError";
  }
}

/**
 * Create appropriate error from HTTP status code
 */
export function createAPIError(
  statusCode: number,
  details: PocketAPIErrorDetails = {}
): PocketAPIError {
  switch (statusCode) {
    case 400:
      return new PocketBadRequestError(details);
    case 401:
      return new PocketAuthError(details);
    case 403:
      return new PocketForbiddenError(details);
    case 503:
      return new PocketUnavailableError(details);
    default:
      return new PocketAPIError(statusCode, details);
  }
}

/**
 * Check if error is worth retrying. The client itself never retries.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof PocketTransportError) return true;
  if (error instanceof PocketAPIError) {
    return error.statusCode >= 500 && error.statusCode < 600;
  }
  return false;
}
