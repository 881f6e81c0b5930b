type BrowserName = 'chromium' | 'firefox' | 'webkit';
type EnvironmentName = 'local' | 'development' | 'staging' | 'production';
type Backoff = 'fixed' | 'exponential';

const ENVIRONMENTS: readonly EnvironmentName[] = ['local', 'development', 'staging', 'production'];

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envOptional(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  return raw ? raw : undefined;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function envList(key: string, fallback: string[], { emptyClears = false } = {}): string[] {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  if (raw.trim() === '') return emptyClears ? [] : fallback;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function envBrowser(key: string, fallback: BrowserName): BrowserName {
  const raw = process.env[key];
  if (raw === 'chromium' || raw === 'firefox' || raw === 'webkit') return raw;
  return fallback;
}

function envBackoff(key: string, fallback: Backoff): Backoff {
  const raw = process.env[key];
  if (raw === 'fixed' || raw === 'exponential') return raw;
  return fallback;
}

// Unknown or missing names fall back to the strictest environment.
function envEnvironment(key: string): EnvironmentName {
  const raw = process.env[key]?.trim().toLowerCase();
  return ENVIRONMENTS.find((name) => name === raw) ?? 'production';
}

export const config = {
  port: envInt('DISPATCH_PORT', 3000),
  host: env('DISPATCH_HOST', '127.0.0.1'),
  environment: envEnvironment('DISPATCH_ENV'),
  apiToken: envOptional('DISPATCH_API_TOKEN'),
  corsOrigins: envList('DISPATCH_CORS_ORIGINS', [
    'http://localhost:3000',
    'http://127.0.0.1:3000',
  ]),
  // Set to an empty value to allow shell and process modules.
  moduleDenylist: envList('DISPATCH_MODULE_DENYLIST', ['shell.*', 'process.*'], { emptyClears: true }),
  moduleAllowlist: envList('DISPATCH_MODULE_ALLOWLIST', []),
  deniedCapabilities: {
    local: envList('DISPATCH_DENY_LOCAL', []),
    development: envList('DISPATCH_DENY_DEVELOPMENT', []),
    staging: envList('DISPATCH_DENY_STAGING', ['shell.exec']),
    production: envList('DISPATCH_DENY_PRODUCTION', [
      'shell.exec',
      'network.localhost',
      'network.private',
    ]),
  },
  moduleTimeoutMs: envInt('DISPATCH_MODULE_TIMEOUT_MS', 30_000),
  maxRetries: envInt('DISPATCH_MAX_RETRIES', 3),
  retryDelayMs: envInt('DISPATCH_RETRY_DELAY_MS', 1000),
  retryBackoff: envBackoff('DISPATCH_RETRY_BACKOFF', 'exponential'),
  maxSessions: envInt('DISPATCH_MAX_SESSIONS', 10),
  sessionIdleTimeoutSeconds: envInt('DISPATCH_SESSION_IDLE_TIMEOUT_S', 300),
  sessionSweepIntervalMs: envInt('DISPATCH_SESSION_SWEEP_INTERVAL_MS', 60_000),
  headless: envBool('DISPATCH_HEADLESS', true),
  browser: envBrowser('DISPATCH_BROWSER', 'chromium'),
  executablePath: envOptional('DISPATCH_EXECUTABLE_PATH'),
} as const;

export type Config = typeof config;
