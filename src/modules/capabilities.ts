import { logger } from '../utils/logger.js';
import { ErrorCode } from './codes.js';
import { ModuleResult } from './result.js';

export const Capability = {
  SHELL_EXEC: 'shell.exec',
  NETWORK_LOCALHOST: 'network.localhost',
  NETWORK_PRIVATE: 'network.private',
  NETWORK_PUBLIC: 'network.public',
  BROWSER_CONTROL: 'browser.control',
  DESKTOP_CONTROL: 'desktop.control',
  FILESYSTEM_READ: 'filesystem.read',
  FILESYSTEM_WRITE: 'filesystem.write',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

export const ENVIRONMENTS = ['local', 'development', 'staging', 'production'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export type PolicyTable = Record<Environment, readonly string[]>;

export interface CapabilityPolicy {
  readonly denied: Readonly<Record<Environment, ReadonlySet<string>>>;
}

export function createPolicy(table: PolicyTable): CapabilityPolicy {
  return Object.freeze({
    denied: Object.freeze({
      local: new Set(table.local),
      development: new Set(table.development),
      staging: new Set(table.staging),
      production: new Set(table.production),
    }),
  });
}

export const DEFAULT_POLICY: CapabilityPolicy = createPolicy({
  local: [],
  development: [],
  staging: [Capability.SHELL_EXEC],
  production: [Capability.SHELL_EXEC, Capability.NETWORK_LOCALHOST, Capability.NETWORK_PRIVATE],
});

export function isEnvironment(name: string): name is Environment {
  return ENVIRONMENTS.some((env) => env === name);
}

/** Unknown or missing names resolve to production. */
export function resolveEnvironment(name: string | undefined): Environment {
  const normalized = name?.trim().toLowerCase();
  return normalized !== undefined && isEnvironment(normalized) ? normalized : 'production';
}

export function isCapabilityAllowed(
  capability: string,
  env: string | undefined,
  policy: CapabilityPolicy = DEFAULT_POLICY,
): boolean {
  return !policy.denied[resolveEnvironment(env)].has(capability);
}

function quoteList(items: readonly string[]): string {
  return items.map((item) => `'${item}'`).join(', ');
}

/**
 * Gate run before a module is entered. Returns a FORBIDDEN failure listing
 * every denied capability, or undefined when the module may run.
 */
export function checkCapabilities(
  capabilities: readonly string[] | undefined,
  moduleId: string,
  env: string | undefined,
  policy: CapabilityPolicy = DEFAULT_POLICY,
): ModuleResult | undefined {
  if (!capabilities || capabilities.length === 0) return undefined;

  const environment = resolveEnvironment(env);
  const denied = [...new Set(capabilities)].filter((cap) => policy.denied[environment].has(cap));
  if (denied.length === 0) return undefined;

  logger.warn({ moduleId, environment, denied }, 'Module blocked by capability policy');

  const noun = denied.length === 1 ? 'capability' : 'capabilities';
  return ModuleResult.failure(
    `Module '${moduleId}' requires ${noun} ${quoteList(denied)} which ${denied.length === 1 ? 'is' : 'are'} not allowed in the ${environment} environment`,
    ErrorCode.FORBIDDEN,
    {
      module_id: moduleId,
      environment,
      denied_capabilities: denied,
      hint: `Run this module in an environment that allows ${quoteList(denied)}, or adjust the capability policy`,
    },
  );
}
