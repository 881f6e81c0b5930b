import { ErrorCode } from './codes.js';

export type ErrorDetails = Record<string, unknown>;

export interface ModuleErrorOptions {
  code?: string;
  field?: string;
  hint?: string;
  details?: ErrorDetails;
}

export interface ModuleErrorDict {
  code: string;
  message: string;
  field?: string;
  hint?: string;
  details: ErrorDetails;
}

/**
 * Base class for failures a module detects itself.
 *
 * The dispatcher turns any instance into a failure result carrying the same
 * code, so modules throw these instead of returning error envelopes.
 */
export class ModuleError extends Error {
  readonly code: string;
  readonly field?: string;
  readonly hint?: string;
  readonly details: ErrorDetails;

  constructor(message: string, options: ModuleErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code ?? ErrorCode.EXECUTION_ERROR;
    this.field = options.field;
    this.hint = options.hint;
    this.details = { ...options.details };
  }

  override toString(): string {
    const field = this.field ? ` (field: ${this.field})` : '';
    return `[${this.code}] ${this.message}${field}`;
  }

  toDict(): ModuleErrorDict {
    return {
      code: this.code,
      message: this.message,
      ...(this.field !== undefined && { field: this.field }),
      ...(this.hint !== undefined && { hint: this.hint }),
      details: { ...this.details },
    };
  }
}

type Fields = Omit<ModuleErrorOptions, 'code'>;

function withDetails(fields: Fields, extra: ErrorDetails): ModuleErrorOptions {
  const details: ErrorDetails = { ...fields.details };
  for (const [key, value] of Object.entries(extra)) {
    if (value !== undefined) details[key] = value;
  }
  return { field: fields.field, hint: fields.hint, details };
}

export class ValidationError extends ModuleError {
  constructor(message: string, fields: Fields = {}) {
    super(message, { ...fields, code: ErrorCode.MISSING_PARAM });
  }
}

export class InvalidTypeError extends ModuleError {
  constructor(message: string, fields: Fields & { expectedType?: string; actualType?: string } = {}) {
    super(message, {
      ...withDetails(fields, { expected_type: fields.expectedType, actual_type: fields.actualType }),
      code: ErrorCode.INVALID_PARAM_TYPE,
    });
  }
}

export class InvalidValueError extends ModuleError {
  constructor(message: string, fields: Fields & { allowedValues?: readonly unknown[] } = {}) {
    super(message, {
      ...withDetails(fields, { allowed_values: fields.allowedValues }),
      code: ErrorCode.INVALID_PARAM_VALUE,
    });
  }
}

export class ConfigMissingError extends ModuleError {
  constructor(message: string, fields: Fields & { configKey?: string } = {}) {
    super(message, {
      ...withDetails(fields, { config_key: fields.configKey }),
      code: ErrorCode.CONFIG_MISSING,
    });
  }
}

export class ExecutionTimeoutError extends ModuleError {
  constructor(message: string, fields: Fields & { timeoutMs?: number } = {}) {
    super(message, {
      ...withDetails(fields, { timeout_ms: fields.timeoutMs }),
      code: ErrorCode.TIMEOUT,
    });
  }
}

export class NetworkError extends ModuleError {
  constructor(message: string, fields: Fields & { url?: string; statusCode?: number } = {}) {
    super(message, {
      ...withDetails(fields, { url: fields.url, status_code: fields.statusCode }),
      code: ErrorCode.NETWORK_ERROR,
    });
  }
}

export class ApiError extends ModuleError {
  constructor(
    message: string,
    fields: Fields & { apiName?: string; statusCode?: number; responseBody?: string } = {},
  ) {
    super(message, {
      ...withDetails(fields, {
        api_name: fields.apiName,
        status_code: fields.statusCode,
        response_body: fields.responseBody,
      }),
      code: ErrorCode.API_ERROR,
    });
  }
}

export class RateLimitedError extends ModuleError {
  constructor(message: string, fields: Fields & { retryAfter?: number } = {}) {
    const hint =
      fields.hint ?? (fields.retryAfter !== undefined ? `Retry after ${fields.retryAfter} seconds` : undefined);
    super(message, {
      ...withDetails({ ...fields, hint }, { retry_after_seconds: fields.retryAfter }),
      code: ErrorCode.RATE_LIMITED,
    });
  }
}

export class AuthenticationError extends ModuleError {
  constructor(message: string, fields: Fields & { service?: string } = {}) {
    super(message, {
      ...withDetails(fields, { service: fields.service }),
      code: ErrorCode.AUTHENTICATION_FAILED,
    });
  }
}

export class NotFoundError extends ModuleError {
  constructor(message: string, fields: Fields & { resource?: string } = {}, code: string = ErrorCode.NOT_FOUND) {
    super(message, { ...withDetails(fields, { resource: fields.resource }), code });
  }
}

export class ElementNotFoundError extends NotFoundError {
  constructor(message: string, fields: Fields & { selector?: string } = {}) {
    super(message, withDetails(fields, { selector: fields.selector }), ErrorCode.ELEMENT_NOT_FOUND);
  }
}

export class FileNotFoundError extends NotFoundError {
  constructor(message: string, fields: Fields & { path?: string } = {}) {
    super(message, withDetails(fields, { path: fields.path }), ErrorCode.FILE_NOT_FOUND);
  }
}

export interface ErrorFields extends Fields {
  [key: string]: unknown;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Rebuilds a typed error from a wire code. Extra fields use the camelCase
 * names the constructors take; unknown codes give a plain ModuleError.
 */
export function errorFromCode(code: string, message: string, fields: ErrorFields = {}): ModuleError {
  const base: Fields = { field: fields.field, hint: fields.hint, details: fields.details };

  switch (code) {
    case ErrorCode.MISSING_PARAM:
      return new ValidationError(message, base);
    case ErrorCode.INVALID_PARAM_TYPE:
      return new InvalidTypeError(message, {
        ...base,
        expectedType: str(fields.expectedType),
        actualType: str(fields.actualType),
      });
    case ErrorCode.INVALID_PARAM_VALUE:
      return new InvalidValueError(message, {
        ...base,
        allowedValues: Array.isArray(fields.allowedValues) ? fields.allowedValues : undefined,
      });
    case ErrorCode.CONFIG_MISSING:
      return new ConfigMissingError(message, { ...base, configKey: str(fields.configKey) });
    case ErrorCode.TIMEOUT:
      return new ExecutionTimeoutError(message, { ...base, timeoutMs: num(fields.timeoutMs) });
    case ErrorCode.NETWORK_ERROR:
      return new NetworkError(message, { ...base, url: str(fields.url), statusCode: num(fields.statusCode) });
    case ErrorCode.API_ERROR:
      return new ApiError(message, {
        ...base,
        apiName: str(fields.apiName),
        statusCode: num(fields.statusCode),
        responseBody: str(fields.responseBody),
      });
    case ErrorCode.RATE_LIMITED:
      return new RateLimitedError(message, { ...base, retryAfter: num(fields.retryAfter) });
    case ErrorCode.AUTHENTICATION_FAILED:
      return new AuthenticationError(message, { ...base, service: str(fields.service) });
    case ErrorCode.NOT_FOUND:
      return new NotFoundError(message, { ...base, resource: str(fields.resource) });
    case ErrorCode.ELEMENT_NOT_FOUND:
      return new ElementNotFoundError(message, { ...base, selector: str(fields.selector) });
    case ErrorCode.FILE_NOT_FOUND:
      return new FileNotFoundError(message, { ...base, path: str(fields.path) });
    default:
      return new ModuleError(message, base);
  }
}
