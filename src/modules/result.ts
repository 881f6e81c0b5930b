import type { ErrorDetails } from './errors.js';

export type ResultMeta = Record<string, unknown>;

/** Meta keys safe to send to callers. Everything else stays in-process. */
export const PUBLIC_META_KEYS: ReadonlySet<string> = new Set([
  'module_id',
  'duration_ms',
  'request_id',
  'error_details',
  'attempts',
]);

export interface ResultDict {
  ok: boolean;
  data?: unknown;
  error?: string;
  error_code?: string;
  meta?: ResultMeta;
}

export interface LegacyErrorDict {
  code: string;
  message: string;
  field?: string;
  hint?: string;
}

export interface LegacyResultDict {
  ok: boolean;
  data?: unknown;
  error?: LegacyErrorDict;
  meta?: ResultMeta;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Payload<T> = { ok: true; data: T } | { ok: false; error: string; errorCode: string };

/**
 * Canonical outcome of one module execution.
 *
 * Exactly one of `data` (success) or `error` + `errorCode` (failure) is set.
 */
export class ModuleResult<T = unknown> {
  readonly meta: ResultMeta;
  private readonly payload: Payload<T>;

  private constructor(payload: Payload<T>, meta: ResultMeta) {
    this.payload = payload;
    this.meta = meta;
  }

  static success<T>(data: T, meta: ResultMeta = {}): ModuleResult<T> {
    return new ModuleResult<T>({ ok: true, data }, { ...meta });
  }

  static failure<T = never>(
    error: string,
    errorCode: string,
    details?: ErrorDetails,
    meta: ResultMeta = {},
  ): ModuleResult<T> {
    const merged: ResultMeta = { ...meta };
    if (details !== undefined) merged.error_details = details;
    return new ModuleResult<T>({ ok: false, error, errorCode }, merged);
  }

  get ok(): boolean {
    return this.payload.ok;
  }

  get data(): T | undefined {
    return this.payload.ok ? this.payload.data : undefined;
  }

  get error(): string | undefined {
    return this.payload.ok ? undefined : this.payload.error;
  }

  get errorCode(): string | undefined {
    return this.payload.ok ? undefined : this.payload.errorCode;
  }

  get isSuccess(): boolean {
    return this.ok;
  }

  get isFailure(): boolean {
    return !this.ok;
  }

  get details(): ErrorDetails {
    const details = this.meta.error_details;
    return isRecord(details) ? details : {};
  }

  withMeta(extra: ResultMeta): ModuleResult<T> {
    return new ModuleResult<T>(this.payload, { ...this.meta, ...extra });
  }

  unwrap(): T {
    if (!this.payload.ok) {
      throw new Error(`[${this.payload.errorCode}] ${this.payload.error}`);
    }
    return this.payload.data;
  }

  unwrapOr<D>(fallback: D): T | D {
    return this.payload.ok ? this.payload.data : fallback;
  }

  toDict(includeInternal = false): ResultDict {
    const dict: ResultDict = this.payload.ok
      ? { ok: true, data: this.payload.data ?? null }
      : { ok: false, error: this.payload.error, error_code: this.payload.errorCode };

    const meta = includeInternal ? { ...this.meta } : this.publicMeta();
    if (Object.keys(meta).length > 0) dict.meta = meta;
    return dict;
  }

  toPublicDict(): ResultDict {
    return this.toDict(false);
  }

  /** Includes tracebacks and debug state. Never send across a process boundary. */
  toInternalDict(): ResultDict {
    return this.toDict(true);
  }

  toLegacyDict(): LegacyResultDict {
    if (this.payload.ok) {
      return { ok: true, data: this.payload.data ?? null, ...this.metaEntry() };
    }
    const details = this.details;
    const error: LegacyErrorDict = { code: this.payload.errorCode, message: this.payload.error };
    if (typeof details.field === 'string') error.field = details.field;
    if (typeof details.hint === 'string') error.hint = details.hint;
    return { ok: false, error, ...this.metaEntry() };
  }

  private publicMeta(): ResultMeta {
    const meta: ResultMeta = {};
    for (const [key, value] of Object.entries(this.meta)) {
      if (PUBLIC_META_KEYS.has(key)) meta[key] = value;
    }
    return meta;
  }

  private metaEntry(): { meta?: ResultMeta } {
    const meta = this.publicMeta();
    return Object.keys(meta).length > 0 ? { meta } : {};
  }
}
