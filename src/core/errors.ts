// src/core/errors.ts

export enum ErrorCode {
  AUTH_FAILED = 'auth_failed',
  RATE_LIMITED = 'rate_limited',
  NETWORK_ERROR = 'network_error',
  NOT_FOUND = 'not_found',
  API_ERROR = 'api_error',
  LOCAL_IO = 'local_io',
  CONFIG_INVALID = 'config_invalid',
  DOWNLOAD_FAILED = 'download_failed',
  INVALID_ARGUMENT = 'invalid_argument',
  MEDIA_LIBRARY = 'media_library',
}

// Codes that abort a whole run rather than a single batch or item.
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.AUTH_FAILED,
  ErrorCode.RATE_LIMITED,
  ErrorCode.LOCAL_IO,
  ErrorCode.CONFIG_INVALID,
  ErrorCode.INVALID_ARGUMENT,
]);

export class LikedropError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LikedropError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isLikedropError(error: unknown, code?: ErrorCode): error is LikedropError {
  return error instanceof LikedropError && (code === undefined || error.code === code);
}

/**
 * Errors that are not LikedropErrors are programming errors and always fatal.
 */
export function isFatal(error: unknown): boolean {
  if (!(error instanceof LikedropError)) {
    return true;
  }
  return FATAL_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
