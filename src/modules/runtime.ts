import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { elapsedMs, sleep } from '../utils/timing.js';
import {
  type CapabilityPolicy,
  DEFAULT_POLICY,
  type Environment,
  checkCapabilities,
  resolveEnvironment,
} from './capabilities.js';
import { ErrorCode, isRetryableCode } from './codes.js';
import { ExecutionTimeoutError, ModuleError } from './errors.js';
import { errorDetails, normalizeResult } from './normalize.js';
import { ModuleResult, type ResultMeta } from './result.js';

export type ModuleParams = Record<string, unknown>;

/** What a module receives. `signal` aborts on timeout or caller cancellation. */
export interface ModuleContext extends Record<string, unknown> {
  params: ModuleParams;
  moduleId: string;
  env: Environment;
  signal: AbortSignal;
}

export type ModuleFn = (context: ModuleContext) => unknown;

export interface ExecuteOptions {
  moduleFn: ModuleFn;
  moduleId: string;
  params?: ModuleParams;
  context?: Record<string, unknown>;
  capabilities?: readonly string[];
  /** Falls back to the environment resolved at startup. */
  env?: string;
  timeoutMs?: number;
  policy?: CapabilityPolicy;
  signal?: AbortSignal;
  requestId?: string;
}

export type RetryBackoff = 'fixed' | 'exponential';

export interface RetryOptions extends ExecuteOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  backoff?: RetryBackoff;
  maxRetryDelayMs?: number;
  retryableCodes?: readonly string[];
}

const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;

class CancelledError extends ModuleError {
  constructor(moduleId: string) {
    super(`Execution of '${moduleId}' was cancelled`, { code: ErrorCode.CANCELLED });
  }
}

function failureFromThrown(err: unknown, moduleId: string): ModuleResult {
  if (err instanceof ModuleError) {
    logger.warn({ moduleId, code: err.code, err: err.message }, 'Module failed');
    return ModuleResult.failure(err.message, err.code, errorDetails(err), {
      ...(err.stack !== undefined && { traceback: err.stack }),
    });
  }

  logger.error({ moduleId, err }, 'Module raised an unexpected error');

  if (err instanceof Error) {
    return ModuleResult.failure(
      err.message || err.name,
      ErrorCode.EXECUTION_ERROR,
      { exception_type: err.name },
      { ...(err.stack !== undefined && { traceback: err.stack }) },
    );
  }
  return ModuleResult.failure(String(err), ErrorCode.EXECUTION_ERROR, { exception_type: typeof err });
}

/**
 * Runs `work` until it settles or `controller` aborts, whichever comes first.
 * The timer aborts the controller, so the module sees the same signal fire.
 */
async function runBounded(
  work: () => unknown,
  controller: AbortController,
  moduleId: string,
  timeoutMs: number | undefined,
): Promise<unknown> {
  const task = Promise.resolve().then(work);
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (timeoutMs !== undefined && timeoutMs > 0) {
    timer = setTimeout(() => {
      logger.warn({ moduleId, timeoutMs }, 'Module timed out');
      controller.abort(new ExecutionTimeoutError(`Module '${moduleId}' timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);
  }

  try {
    return await Promise.race([task, aborted]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Executes one module under the capability gate and an optional time bound.
 * Never throws: every outcome comes back as a ModuleResult carrying
 * `duration_ms` and `module_id`.
 */
export async function executeModule(options: ExecuteOptions): Promise<ModuleResult> {
  const startedAt = performance.now();
  const { moduleFn, moduleId, signal } = options;
  const environment = resolveEnvironment(options.env ?? config.environment);
  const baseMeta: ResultMeta = {
    module_id: moduleId,
    ...(options.requestId !== undefined && { request_id: options.requestId }),
  };
  const finish = (result: ModuleResult): ModuleResult =>
    result.withMeta({ ...baseMeta, duration_ms: elapsedMs(startedAt) });

  const denied = checkCapabilities(options.capabilities, moduleId, environment, options.policy ?? DEFAULT_POLICY);
  if (denied) return finish(denied);

  if (signal?.aborted) {
    return finish(failureFromThrown(new CancelledError(moduleId), moduleId));
  }

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(new CancelledError(moduleId));
  signal?.addEventListener('abort', forwardAbort, { once: true });

  const context: ModuleContext = {
    ...options.context,
    params: options.params ?? {},
    moduleId,
    env: environment,
    signal: controller.signal,
  };

  try {
    const raw = await runBounded(() => moduleFn(context), controller, moduleId, options.timeoutMs);
    return finish(normalizeResult(raw));
  } catch (err) {
    return finish(failureFromThrown(err, moduleId));
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
    // Anything still running was left behind; tell it to stop.
    if (!controller.signal.aborted) controller.abort(new CancelledError(moduleId));
  }
}

function retryDelay(options: RetryOptions, attempt: number, last: ModuleResult): number {
  const base = options.retryDelayMs ?? config.retryDelayMs;
  const cap = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
  const backoff = options.backoff ?? config.retryBackoff;
  let delay = backoff === 'exponential' ? base * 2 ** (attempt - 1) : base;

  const retryAfter = last.details.retry_after_seconds;
  if (typeof retryAfter === 'number' && retryAfter > 0) {
    delay = Math.max(delay, retryAfter * 1000);
  }
  return Math.min(delay, cap);
}

/**
 * Like executeModule, retrying transient failures (network, API, rate limit)
 * up to `maxRetries` extra attempts. Exhaustion is reported as RETRY_EXHAUSTED
 * with the last error's message and details; `meta.attempts` is always set.
 */
export async function executeModuleWithRetry(options: RetryOptions): Promise<ModuleResult> {
  const startedAt = performance.now();
  const maxRetries = Math.max(0, options.maxRetries ?? config.maxRetries);
  const { moduleId, signal, retryableCodes } = options;
  const isRetryable = (code: string | undefined): boolean =>
    retryableCodes === undefined ? isRetryableCode(code) : code !== undefined && retryableCodes.includes(code);
  // Duration covers every attempt and every backoff.
  const finish = (result: ModuleResult, attempts: number): ModuleResult =>
    result.withMeta({
      module_id: moduleId,
      ...(options.requestId !== undefined && { request_id: options.requestId }),
      duration_ms: elapsedMs(startedAt),
      attempts,
    });

  let last = await executeModule(options);
  let attempts = 1;

  while (!last.ok && isRetryable(last.errorCode)) {
    if (attempts > maxRetries) {
      logger.warn({ moduleId, attempts, code: last.errorCode }, 'Retries exhausted');
      return finish(
        ModuleResult.failure(
          last.error ?? 'Module failed',
          ErrorCode.RETRY_EXHAUSTED,
          { ...last.details, last_error_code: last.errorCode, attempts },
          last.meta,
        ),
        attempts,
      );
    }

    const delay = retryDelay(options, attempts, last);
    logger.info({ moduleId, attempt: attempts, delay, code: last.errorCode }, 'Retrying module');

    try {
      await sleep(delay, signal);
    } catch {
      return finish(failureFromThrown(new CancelledError(moduleId), moduleId), attempts);
    }

    last = await executeModule(options);
    attempts += 1;
  }

  return finish(last, attempts);
}

/** Adapts a synchronous module to the async module contract. */
export function wrapSyncModule<R>(fn: (context: ModuleContext) => R): (context: ModuleContext) => Promise<R> {
  return async (context) => fn(context);
}
