import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { elapsedMs } from '../utils/timing.js';
import {
  type CapabilityPolicy,
  DEFAULT_POLICY,
  type Environment,
  createPolicy,
  resolveEnvironment,
} from './capabilities.js';
import { ErrorCode } from './codes.js';
import type { ModuleRegistry } from './registry.js';
import { ModuleResult, type ResultMeta } from './result.js';
import { type RetryBackoff, executeModule, executeModuleWithRetry } from './runtime.js';

export interface DispatcherOptions {
  env?: string;
  policy?: CapabilityPolicy;
  /** Glob patterns (`*` wildcard) of module ids that may never run. */
  moduleDenylist?: readonly string[];
  /** When non-empty, only matching module ids may run. */
  moduleAllowlist?: readonly string[];
  defaultTimeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  backoff?: RetryBackoff;
}

export interface DispatchRequest {
  params?: Record<string, unknown>;
  context?: Record<string, unknown>;
  /** Retry transient failures; defaults to the module's own `retryable` flag. */
  retry?: boolean;
  signal?: AbortSignal;
  requestId?: string;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

export function matchesAny(moduleId: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((re) => re.test(moduleId));
}

/** Policy table built from the `DISPATCH_DENY_<ENV>` settings. */
export function policyFromConfig(): CapabilityPolicy {
  return createPolicy(config.deniedCapabilities);
}

/**
 * Runs registered modules by id. Environment, capability policy and module
 * allow/deny lists are fixed at construction.
 */
export class ModuleDispatcher {
  readonly environment: Environment;
  private readonly registry: ModuleRegistry;
  private readonly policy: CapabilityPolicy;
  private readonly denylist: RegExp[];
  private readonly allowlist: RegExp[];
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly backoff: RetryBackoff;

  constructor(registry: ModuleRegistry, options: DispatcherOptions = {}) {
    this.registry = registry;
    this.environment = resolveEnvironment(options.env ?? config.environment);
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.denylist = (options.moduleDenylist ?? config.moduleDenylist).map(globToRegExp);
    this.allowlist = (options.moduleAllowlist ?? config.moduleAllowlist).map(globToRegExp);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? config.moduleTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? config.retryDelayMs;
    this.backoff = options.backoff ?? config.retryBackoff;
  }

  isModuleAllowed(moduleId: string): boolean {
    if (this.allowlist.length > 0) return matchesAny(moduleId, this.allowlist);
    return !matchesAny(moduleId, this.denylist);
  }

  async dispatch(moduleId: string, request: DispatchRequest = {}): Promise<ModuleResult> {
    const startedAt = performance.now();
    const meta = (): ResultMeta => ({
      module_id: moduleId,
      ...(request.requestId !== undefined && { request_id: request.requestId }),
      duration_ms: elapsedMs(startedAt),
    });

    const definition = this.registry.get(moduleId);
    if (!definition) {
      return ModuleResult.failure(`Module not found: ${moduleId}`, ErrorCode.NOT_FOUND, { module_id: moduleId }, meta());
    }

    if (!this.isModuleAllowed(moduleId)) {
      logger.warn({ moduleId }, 'Module blocked by module list');
      return ModuleResult.failure(
        `Module '${moduleId}' is disabled on this server`,
        ErrorCode.FORBIDDEN,
        { module_id: moduleId, environment: this.environment },
        meta(),
      );
    }

    const timeoutMs = definition.timeoutMs ?? this.defaultTimeoutMs;
    const options = {
      moduleFn: definition.run,
      moduleId,
      params: request.params,
      context: request.context,
      capabilities: definition.capabilities,
      env: this.environment,
      policy: this.policy,
      timeoutMs: timeoutMs > 0 ? timeoutMs : undefined,
      signal: request.signal,
      requestId: request.requestId,
    };

    if (request.retry ?? definition.retryable ?? false) {
      return executeModuleWithRetry({
        ...options,
        maxRetries: definition.maxRetries ?? this.maxRetries,
        retryDelayMs: definition.retryDelayMs ?? this.retryDelayMs,
        backoff: this.backoff,
      });
    }
    return executeModule(options);
  }
}
