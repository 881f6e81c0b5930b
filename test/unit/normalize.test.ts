import { describe, expect, it } from 'vitest';
import { ErrorCode } from '../../src/modules/codes.js';
import { ModuleError, NetworkError } from '../../src/modules/errors.js';
import { classifyRaw, normalizeResult } from '../../src/modules/normalize.js';
import { ModuleResult } from '../../src/modules/result.js';

describe('normalizeResult', () => {
  it('should pass a ModuleResult through unchanged', () => {
    const original = ModuleResult.success({ a: 1 }, { module_id: 'x' });
    expect(normalizeResult(original)).toBe(original);
  });

  it('should unwrap an ok envelope with data', () => {
    const result = normalizeResult({ ok: true, data: { id: 7 } });
    expect(result.ok).toBe(true);
    expect(result.data).toEqual({ id: 7 });
  });

  it('should unwrap a status envelope with data', () => {
    const result = normalizeResult({ status: 'success', data: [1, 2] });
    expect(result.ok).toBe(true);
    expect(result.data).toEqual([1, 2]);
  });

  it('should strip protocol keys when there is no data key', () => {
    const result = normalizeResult({ ok: true, message: 'done', meta: { x: 1 }, count: 3, items: ['a'] });
    expect(result.data).toEqual({ count: 3, items: ['a'] });
  });

  it('should treat a non-error status without ok as success', () => {
    const result = normalizeResult({ status: 'pending', job: 'j1' });
    expect(result.ok).toBe(true);
    expect(result.data).toEqual({ job: 'j1' });
  });

  it('should wrap plain values as data', () => {
    expect(normalizeResult('hello').data).toBe('hello');
    expect(normalizeResult(42).data).toBe(42);
    expect(normalizeResult(null).toDict()).toEqual({ ok: true, data: null });
    expect(normalizeResult([1, 2]).data).toEqual([1, 2]);
  });

  it('should keep a mapping without protocol keys intact', () => {
    expect(normalizeResult({ name: 'a', value: 1 }).data).toEqual({ name: 'a', value: 1 });
  });

  it('should decode a flat failure envelope', () => {
    const result = normalizeResult({ ok: false, error: 'quota exceeded', error_code: 'RATE_LIMITED', details: { retry_after_seconds: 3 } });
    expect(result.ok).toBe(false);
    expect(result.error).toBe('quota exceeded');
    expect(result.errorCode).toBe('RATE_LIMITED');
    expect(result.details).toEqual({ retry_after_seconds: 3 });
  });

  it('should decode a nested error object', () => {
    const result = normalizeResult({
      ok: false,
      error: { code: 'MISSING_PARAM', message: 'url is required', field: 'url', hint: 'Pass a url' },
    });
    expect(result.errorCode).toBe('MISSING_PARAM');
    expect(result.error).toBe('url is required');
    expect(result.details).toEqual({ field: 'url', hint: 'Pass a url' });
  });

  it('should decode status error with message and default code', () => {
    const result = normalizeResult({ status: 'error', message: 'it broke' });
    expect(result.ok).toBe(false);
    expect(result.error).toBe('it broke');
    expect(result.errorCode).toBe(ErrorCode.EXECUTION_ERROR);
  });

  it('should read details from meta.error_details', () => {
    const result = normalizeResult({ ok: false, error: 'x', meta: { error_details: { step: 4 } } });
    expect(result.details).toEqual({ step: 4 });
  });

  it('should supply a message when a failure has none', () => {
    const result = normalizeResult({ ok: false });
    expect(result.error).toBe('Module reported failure without a message');
    expect(result.errorCode).toBe('EXECUTION_ERROR');
  });

  it('should decode a returned ModuleError like a thrown one', () => {
    const result = normalizeResult(new NetworkError('unreachable', { url: 'http://example.test', hint: 'Check DNS' }));
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe('NETWORK_ERROR');
    expect(result.details).toEqual({ url: 'http://example.test', hint: 'Check DNS' });
  });

  it('should apply meta to decoded results', () => {
    expect(normalizeResult('v', { module_id: 'm' }).meta).toEqual({ module_id: 'm' });
  });
});

describe('classifyRaw', () => {
  it('should classify every shape', () => {
    expect(classifyRaw(ModuleResult.success(1)).kind).toBe('result');
    expect(classifyRaw(new ModuleError('x')).kind).toBe('error');
    expect(classifyRaw({ ok: true, data: 1 }).kind).toBe('envelope');
    expect(classifyRaw({ ok: true, n: 1 }).kind).toBe('fields');
    expect(classifyRaw({ ok: 0 }).kind).toBe('failure');
    expect(classifyRaw(new Date(0)).kind).toBe('raw');
    expect(classifyRaw(undefined).kind).toBe('raw');
  });

  it('should only treat a literal true ok as success', () => {
    expect(classifyRaw({ ok: 'false', data: 1 }).kind).toBe('failure');
    expect(classifyRaw({ ok: 1, data: 1 }).kind).toBe('failure');

    const result = normalizeResult({ ok: 'yes', data: { id: 1 } });
    expect(result.ok).toBe(false);
    expect(result.errorCode).toBe(ErrorCode.EXECUTION_ERROR);
    expect(result.error).toBe('Module reported failure without a message');
  });
});

describe('normalizeResult of a serialized result', () => {
  it('should restore a success', () => {
    const original = ModuleResult.success({ rows: [1, 2], next: null });
    const restored = normalizeResult(original.toDict());

    expect(restored.ok).toBe(true);
    expect(restored.data).toEqual({ rows: [1, 2], next: null });
    expect(restored.error).toBeUndefined();
    expect(restored.errorCode).toBeUndefined();
  });

  it('should restore a failure with its details', () => {
    const original = ModuleResult.failure('Upstream said no', ErrorCode.API_ERROR, {
      api_name: 'billing',
      status_code: 502,
    });
    const restored = normalizeResult(original.toDict());

    expect(restored.ok).toBe(false);
    expect(restored.data).toBeUndefined();
    expect(restored.error).toBe('Upstream said no');
    expect(restored.errorCode).toBe(ErrorCode.API_ERROR);
    expect(restored.details).toEqual({ api_name: 'billing', status_code: 502 });
    expect(restored.meta.error_details).toEqual(original.meta.error_details);
  });
});
