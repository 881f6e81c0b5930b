import { describe, expect, it } from 'vitest';
import { ErrorCode, isRetryableCode } from '../../src/modules/codes.js';
import {
  ApiError,
  ElementNotFoundError,
  ExecutionTimeoutError,
  InvalidTypeError,
  InvalidValueError,
  ModuleError,
  NotFoundError,
  RateLimitedError,
  ValidationError as MissingParamError,
  errorFromCode,
} from '../../src/modules/errors.js';
import {
  AppError,
  AuthRequiredError,
  InvalidSessionTokenError,
  SessionLimitError,
  SessionNotFoundError,
  UnauthorizedAccessError,
  ValidationError,
} from '../../src/utils/errors.js';

describe('AppError', () => {
  it('should set message, statusCode, and code', () => {
    const err = new AppError('test message', 500, 'TEST_ERROR');
    expect(err.message).toBe('test message');
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe('TEST_ERROR');
    expect(err.name).toBe('AppError');
    expect(err).toBeInstanceOf(Error);
  });

  it('should map session errors to HTTP statuses', () => {
    expect(new SessionNotFoundError('sess-abc')).toMatchObject({
      statusCode: 404,
      code: 'SESSION_NOT_FOUND',
      message: 'Session not found: sess-abc',
    });
    expect(new SessionLimitError(10)).toMatchObject({
      statusCode: 429,
      code: 'SESSION_LIMIT_REACHED',
      message: 'Maximum session limit reached (10)',
    });
    expect(new InvalidSessionTokenError('s1')).toMatchObject({ statusCode: 401, code: 'INVALID_SESSION_TOKEN' });
    expect(new ValidationError('bad')).toMatchObject({ statusCode: 400, code: 'VALIDATION_ERROR' });
    expect(new AuthRequiredError()).toMatchObject({ statusCode: 401, code: 'AUTH_REQUIRED' });
  });

  it('should name the plugin in UnauthorizedAccessError', () => {
    const err = new UnauthorizedAccessError('browser_session:s1', 'plugin-b');
    expect(err.statusCode).toBe(403);
    expect(err.message).toBe("Plugin 'plugin-b' is not authorized to access browser_session:s1");
    expect(new UnauthorizedAccessError('x').message).toBe('Caller is not authorized to access x');
  });
});

describe('ModuleError', () => {
  it('should default to EXECUTION_ERROR', () => {
    const err = new ModuleError('boom');
    expect(err.code).toBe(ErrorCode.EXECUTION_ERROR);
    expect(err.details).toEqual({});
    expect(err.toString()).toBe('[EXECUTION_ERROR] boom');
  });

  it('should include the field in toString and toDict', () => {
    const err = new MissingParamError("Missing required parameter 'url'", { field: 'url', hint: 'Pass a url' });
    expect(err.code).toBe(ErrorCode.MISSING_PARAM);
    expect(err.toString()).toBe("[MISSING_PARAM] Missing required parameter 'url' (field: url)");
    expect(err.toDict()).toEqual({
      code: 'MISSING_PARAM',
      message: "Missing required parameter 'url'",
      field: 'url',
      hint: 'Pass a url',
      details: {},
    });
  });

  it('should carry subclass-specific details in snake_case', () => {
    expect(new InvalidTypeError('wrong', { expectedType: 'string', actualType: 'number' }).details).toEqual({
      expected_type: 'string',
      actual_type: 'number',
    });
    expect(new InvalidValueError('bad', { allowedValues: ['a', 'b'] }).details).toEqual({ allowed_values: ['a', 'b'] });
    expect(new ExecutionTimeoutError('slow', { timeoutMs: 50 }).details).toEqual({ timeout_ms: 50 });
    expect(new ApiError('api', { apiName: 'crm', statusCode: 502 }).details).toEqual({
      api_name: 'crm',
      status_code: 502,
    });
  });

  it('should derive a hint from retryAfter on RateLimitedError', () => {
    const err = new RateLimitedError('slow down', { retryAfter: 5 });
    expect(err.code).toBe(ErrorCode.RATE_LIMITED);
    expect(err.hint).toBe('Retry after 5 seconds');
    expect(err.details).toEqual({ retry_after_seconds: 5 });
  });

  it('should keep the specific code on not-found subclasses', () => {
    const err = new ElementNotFoundError('no button', { selector: '#go' });
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err.code).toBe(ErrorCode.ELEMENT_NOT_FOUND);
    expect(err.details).toEqual({ selector: '#go' });
  });
});

describe('errorFromCode', () => {
  it('should rebuild the typed error for a known code', () => {
    const err = errorFromCode(ErrorCode.NETWORK_ERROR, 'unreachable', { url: 'http://example.test', statusCode: 503 });
    expect(err.constructor.name).toBe('NetworkError');
    expect(err.code).toBe('NETWORK_ERROR');
    expect(err.details).toEqual({ url: 'http://example.test', status_code: 503 });
  });

  it('should fall back to a plain ModuleError for unknown codes', () => {
    const err = errorFromCode('SOMETHING_ELSE', 'odd', { field: 'x' });
    expect(err.constructor).toBe(ModuleError);
    expect(err.code).toBe(ErrorCode.EXECUTION_ERROR);
    expect(err.field).toBe('x');
  });
});

describe('isRetryableCode', () => {
  it('should treat only transient codes as retryable', () => {
    expect(isRetryableCode('NETWORK_ERROR')).toBe(true);
    expect(isRetryableCode('API_ERROR')).toBe(true);
    expect(isRetryableCode('RATE_LIMITED')).toBe(true);
    expect(isRetryableCode('TIMEOUT')).toBe(false);
    expect(isRetryableCode('MISSING_PARAM')).toBe(false);
    expect(isRetryableCode(undefined)).toBe(false);
  });
});
