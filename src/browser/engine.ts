import { type Browser, type BrowserType, chromium, firefox, webkit } from 'playwright-core';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

export type BrowserName = 'chromium' | 'firefox' | 'webkit';

const browserTypes: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

export function isBrowserName(value: string): value is BrowserName {
  return value === 'chromium' || value === 'firefox' || value === 'webkit';
}

export interface BrowserLaunchOptions {
  args?: string[];
  executablePath?: string;
  env?: Record<string, string>;
  timeout?: number;
}

export interface LaunchRequest extends BrowserLaunchOptions {
  browser: BrowserName;
  headless: boolean;
}

/** A running browser process reachable over its remote-debugging endpoint. */
export interface LaunchedBrowser {
  wsEndpoint(): string;
  close(): Promise<void>;
}

export interface RemoteContext {
  close(): Promise<void>;
}

/** A client connection to a launched browser. */
export interface RemoteBrowser {
  newContext(): Promise<RemoteContext>;
  close(): Promise<void>;
}

export interface BrowserLauncher<B extends RemoteBrowser = RemoteBrowser> {
  launch(request: LaunchRequest): Promise<LaunchedBrowser>;
  connect(wsEndpoint: string, browser: BrowserName): Promise<B>;
}

const DEFAULT_ARGS = ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'];

function processEnv(extra: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) merged[key] = value;
  }
  return { ...merged, ...extra };
}

/**
 * Launches browser servers through playwright-core. Each launch is its own
 * process with its own websocket endpoint.
 */
export class PlaywrightLauncher implements BrowserLauncher<Browser> {
  async launch(request: LaunchRequest): Promise<LaunchedBrowser> {
    const browserType = browserTypes[request.browser];
    const executablePath = request.executablePath ?? config.executablePath;

    logger.info({ browser: request.browser, headless: request.headless }, 'Launching browser server');

    const server = await browserType.launchServer({
      headless: request.headless,
      args: request.args ?? (request.browser === 'chromium' ? DEFAULT_ARGS : []),
      ...(executablePath !== undefined && { executablePath }),
      ...(request.env !== undefined && { env: processEnv(request.env) }),
      ...(request.timeout !== undefined && { timeout: request.timeout }),
    });

    logger.info({ browser: request.browser, wsEndpoint: server.wsEndpoint() }, 'Browser server launched');
    return server;
  }

  async connect(wsEndpoint: string, browser: BrowserName): Promise<Browser> {
    return browserTypes[browser].connect(wsEndpoint);
  }
}
