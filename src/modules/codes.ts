export const ErrorCode = {
  MISSING_PARAM: 'MISSING_PARAM',
  INVALID_PARAM_TYPE: 'INVALID_PARAM_TYPE',
  INVALID_PARAM_VALUE: 'INVALID_PARAM_VALUE',
  CONFIG_MISSING: 'CONFIG_MISSING',
  TIMEOUT: 'TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  API_ERROR: 'API_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  ELEMENT_NOT_FOUND: 'ELEMENT_NOT_FOUND',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  EXECUTION_ERROR: 'EXECUTION_ERROR',
  FORBIDDEN: 'FORBIDDEN',
  RETRY_EXHAUSTED: 'RETRY_EXHAUSTED',
  CANCELLED: 'CANCELLED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Transient failures; everything else is assumed permanent. */
export const RETRYABLE_CODES: readonly string[] = [
  ErrorCode.NETWORK_ERROR,
  ErrorCode.API_ERROR,
  ErrorCode.RATE_LIMITED,
];

export function isRetryableCode(code: string | undefined): boolean {
  return code !== undefined && RETRYABLE_CODES.includes(code);
}
