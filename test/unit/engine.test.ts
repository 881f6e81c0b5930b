/**
 * Tests for PlaywrightLauncher (src/browser/engine.ts).
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('playwright-core', () => {
  const createBrowserType = (port: number) => ({
    launchServer: vi.fn().mockImplementation(async () => ({
      wsEndpoint: vi.fn().mockReturnValue(`ws://127.0.0.1:${port}/server`),
      close: vi.fn().mockResolvedValue(undefined),
    })),
    connect: vi.fn().mockResolvedValue({ newContext: vi.fn(), close: vi.fn() }),
  });

  return {
    chromium: createBrowserType(9001),
    firefox: createBrowserType(9002),
    webkit: createBrowserType(9003),
  };
});

vi.mock('../../src/config.js', () => ({
  config: {
    executablePath: undefined,
  },
}));

import { chromium, firefox } from 'playwright-core';
import { PlaywrightLauncher, isBrowserName } from '../../src/browser/engine.js';

beforeEach(() => {
  vi.clearAllMocks();
});

describe('isBrowserName', () => {
  it('should accept the three engines only', () => {
    expect(isBrowserName('chromium')).toBe(true);
    expect(isBrowserName('firefox')).toBe(true);
    expect(isBrowserName('webkit')).toBe(true);
    expect(isBrowserName('lynx')).toBe(false);
  });
});

describe('PlaywrightLauncher', () => {
  describe('launch', () => {
    it('should launch a chromium server with the default sandbox args', async () => {
      const launcher = new PlaywrightLauncher();
      const server = await launcher.launch({ browser: 'chromium', headless: true });

      expect(chromium.launchServer).toHaveBeenCalledWith({
        headless: true,
        args: ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'],
      });
      expect(server.wsEndpoint()).toBe('ws://127.0.0.1:9001/server');
    });

    it('should launch other engines without chromium args', async () => {
      const launcher = new PlaywrightLauncher();
      await launcher.launch({ browser: 'firefox', headless: false });

      expect(firefox.launchServer).toHaveBeenCalledWith({ headless: false, args: [] });
      expect(chromium.launchServer).not.toHaveBeenCalled();
    });

    it('should forward explicit options', async () => {
      const launcher = new PlaywrightLauncher();
      await launcher.launch({
        browser: 'chromium',
        headless: true,
        args: ['--custom'],
        executablePath: '/opt/browser/chrome',
        timeout: 5000,
        env: { BROWSER_FLAG: '1' },
      });

      expect(chromium.launchServer).toHaveBeenCalledWith(
        expect.objectContaining({
          args: ['--custom'],
          executablePath: '/opt/browser/chrome',
          timeout: 5000,
          env: expect.objectContaining({ BROWSER_FLAG: '1' }),
        }),
      );
    });
  });

  describe('connect', () => {
    it('should connect with the matching browser type', async () => {
      const launcher = new PlaywrightLauncher();
      await launcher.connect('ws://127.0.0.1:9002/server', 'firefox');

      expect(firefox.connect).toHaveBeenCalledWith('ws://127.0.0.1:9002/server');
    });
  });
});
