import { afterEach, describe, expect, it, vi } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  const { config } = await import('../../src/config.js');
  return config;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('config defaults', () => {
  it('should use the documented defaults', async () => {
    const config = await loadConfig();

    expect(config.port).toBe(3000);
    expect(config.host).toBe('127.0.0.1');
    expect(config.environment).toBe('production');
    expect(config.maxSessions).toBe(10);
    expect(config.moduleTimeoutMs).toBe(30_000);
    expect(config.retryBackoff).toBe('exponential');
    expect(config.browser).toBe('chromium');
    expect(config.headless).toBe(true);
    expect(config.apiToken).toBeUndefined();
    expect(config.moduleDenylist).toEqual(['shell.*', 'process.*']);
  });
});

describe('config from environment', () => {
  it('should parse numbers, booleans and lists', async () => {
    vi.stubEnv('DISPATCH_PORT', '8080');
    vi.stubEnv('DISPATCH_HEADLESS', 'false');
    vi.stubEnv('DISPATCH_MODULE_DENYLIST', 'shell.*, desktop.* ,');
    vi.stubEnv('DISPATCH_API_TOKEN', 'test-secret');
    const config = await loadConfig();

    expect(config.port).toBe(8080);
    expect(config.headless).toBe(false);
    expect(config.moduleDenylist).toEqual(['shell.*', 'desktop.*']);
    expect(config.apiToken).toBe('test-secret');
  });

  it('should clear the module denylist when set to an empty value', async () => {
    vi.stubEnv('DISPATCH_MODULE_DENYLIST', '');
    expect((await loadConfig()).moduleDenylist).toEqual([]);
  });

  it('should fall back on malformed values', async () => {
    vi.stubEnv('DISPATCH_PORT', 'not-a-number');
    vi.stubEnv('DISPATCH_BROWSER', 'lynx');
    vi.stubEnv('DISPATCH_RETRY_BACKOFF', 'random');
    const config = await loadConfig();

    expect(config.port).toBe(3000);
    expect(config.browser).toBe('chromium');
    expect(config.retryBackoff).toBe('exponential');
  });

  it('should resolve the environment case-insensitively and fail closed', async () => {
    vi.stubEnv('DISPATCH_ENV', 'Staging');
    expect((await loadConfig()).environment).toBe('staging');

    vi.stubEnv('DISPATCH_ENV', 'qa');
    expect((await loadConfig()).environment).toBe('production');
  });

  it('should override the per-environment deny lists', async () => {
    vi.stubEnv('DISPATCH_DENY_LOCAL', 'browser.control');
    const config = await loadConfig();

    expect(config.deniedCapabilities.local).toEqual(['browser.control']);
    expect(config.deniedCapabilities.production).toEqual(['shell.exec', 'network.localhost', 'network.private']);
  });
});
