// src/core/errors.ts
export enum ErrorCode {
  UNSUPPORTED_URL = 'unsupported_url',
  USER_NOT_FOUND = 'user_not_found',
  LOGIN_REQUIRED = 'login_required',
  MALFORMED_RESPONSE = 'malformed_response',
  TIMEOUT = 'timeout',
  NETWORK_ERROR = 'network_error',
  INVALID_ARGUMENT = 'invalid_argument',
  CONFIG_INVALID = 'config_invalid',
  BROWSER_NOT_FOUND = 'browser_not_found',
  STORE_FAILED = 'store_failed',
}

export class DumpError extends Error {
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
    this.name = 'DumpError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isDumpError(error: unknown, code?: ErrorCode): error is DumpError {
  return error instanceof DumpError && (code === undefined || error.code === code);
}

const EXIT_CODES: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.UNSUPPORTED_URL]: 2,
  [ErrorCode.INVALID_ARGUMENT]: 2,
  [ErrorCode.CONFIG_INVALID]: 2,
  [ErrorCode.USER_NOT_FOUND]: 3,
  [ErrorCode.LOGIN_REQUIRED]: 4,
};

export function exitCodeFor(error: unknown): number {
  if (error instanceof DumpError) {
    return EXIT_CODES[error.code] ?? 1;
  }
  return 1;
}

export function describeError(error: unknown): string {
  if (error instanceof DumpError) {
    return error.suggestion ? `${error.message}\n${error.suggestion}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
