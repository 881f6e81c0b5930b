import { ErrorCode } from './codes.js';
import { type ErrorDetails, ModuleError } from './errors.js';
import { ModuleResult, type ResultMeta } from './result.js';

/** Envelope keys that must never end up inside business data. */
export const PROTOCOL_KEYS: ReadonlySet<string> = new Set(['ok', 'status', 'message', 'meta']);

/**
 * Every shape a module may hand back, decided once at the adapter boundary.
 */
export type RawOutcome =
  | { kind: 'result'; result: ModuleResult }
  | { kind: 'error'; error: ModuleError }
  | { kind: 'envelope'; data: unknown }
  | { kind: 'fields'; fields: Record<string, unknown> }
  | { kind: 'failure'; message: string; code: string; details?: ErrorDetails }
  | { kind: 'raw'; value: unknown };

export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function stripProtocolKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!PROTOCOL_KEYS.has(key)) fields[key] = value;
  }
  return fields;
}

function failureFromEnvelope(raw: Record<string, unknown>): RawOutcome {
  const { error } = raw;
  let message: string | undefined;
  let code = typeof raw.error_code === 'string' ? raw.error_code : undefined;
  let details: ErrorDetails | undefined;

  if (isRecord(raw.details)) {
    details = { ...raw.details };
  } else if (isRecord(raw.meta) && isRecord(raw.meta.error_details)) {
    details = { ...raw.meta.error_details };
  }

  if (typeof error === 'string') {
    message = error;
  } else if (isRecord(error)) {
    if (typeof error.message === 'string') message = error.message;
    if (typeof error.code === 'string') code ??= error.code;
    for (const key of ['field', 'hint'] as const) {
      const value = error[key];
      if (typeof value === 'string') details = { ...details, [key]: value };
    }
  }

  if (message === undefined && typeof raw.message === 'string') {
    message = raw.message;
  }

  return {
    kind: 'failure',
    message: message ?? 'Module reported failure without a message',
    code: code ?? ErrorCode.EXECUTION_ERROR,
    details,
  };
}

export function classifyRaw(raw: unknown): RawOutcome {
  if (raw instanceof ModuleResult) return { kind: 'result', result: raw };
  if (raw instanceof ModuleError) return { kind: 'error', error: raw };
  if (!isRecord(raw)) return { kind: 'raw', value: raw };

  const hasOk = 'ok' in raw;
  const hasStatus = 'status' in raw;
  if (!hasOk && !hasStatus) return { kind: 'raw', value: raw };

  // Only a literal `true` counts as success.
  const failed = hasOk ? raw.ok !== true : raw.status === 'error';
  if (failed) return failureFromEnvelope(raw);

  if ('data' in raw) return { kind: 'envelope', data: raw.data };
  return { kind: 'fields', fields: stripProtocolKeys(raw) };
}

export function errorDetails(error: ModuleError): ErrorDetails {
  return {
    ...error.details,
    ...(error.field !== undefined && { field: error.field }),
    ...(error.hint !== undefined && { hint: error.hint }),
  };
}

export function decodeOutcome(outcome: RawOutcome, meta: ResultMeta = {}): ModuleResult {
  switch (outcome.kind) {
    case 'result':
      return outcome.result;
    case 'error':
      return ModuleResult.failure(outcome.error.message, outcome.error.code, errorDetails(outcome.error), meta);
    case 'envelope':
      return ModuleResult.success(outcome.data, meta);
    case 'fields':
      return ModuleResult.success(outcome.fields, meta);
    case 'failure':
      return ModuleResult.failure(outcome.message, outcome.code, outcome.details, meta);
    case 'raw':
      return ModuleResult.success(outcome.value, meta);
    default: {
      const unreachable: never = outcome;
      return unreachable;
    }
  }
}

/**
 * Converts whatever a module returned into the canonical result.
 * A ModuleResult is passed through unchanged; `meta` applies to the others.
 */
export function normalizeResult(raw: unknown, meta: ResultMeta = {}): ModuleResult {
  return decodeOutcome(classifyRaw(raw), meta);
}
