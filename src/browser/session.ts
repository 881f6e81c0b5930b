import { randomBytes, timingSafeEqual } from 'node:crypto';
import { logger } from '../utils/logger.js';
import type { BrowserName, LaunchedBrowser, RemoteBrowser, RemoteContext } from './engine.js';

/** The only view of a session handed to callers. */
export interface SessionHandle {
  sessionId: string;
  wsEndpoint: string;
  sessionToken: string;
}

/** Public metadata. Carries neither the endpoint nor the token: both grant control of the browser. */
export interface SessionInfo {
  sessionId: string;
  headless: boolean;
  browser: BrowserName;
  createdAt: number;
  lastAccessed: number;
  contextCount: number;
  ownerPlugin?: string;
  tenantId?: string;
  inUse: boolean;
}

export interface BrowserSessionInit {
  id: string;
  server: LaunchedBrowser;
  headless: boolean;
  browser: BrowserName;
  now: number;
  ownerPlugin?: string;
  tenantId?: string;
}

export function generateSessionToken(): string {
  return randomBytes(32).toString('base64url');
}

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class BrowserSession {
  readonly id: string;
  readonly wsEndpoint: string;
  readonly headless: boolean;
  readonly browser: BrowserName;
  readonly createdAt: number;
  readonly token: string;
  readonly ownerPlugin?: string;
  readonly tenantId?: string;
  readonly contexts: Map<string, RemoteContext> = new Map();
  lastAccessed: number;
  /** In-flight operations holding this session; leased sessions are never evicted. */
  leases = 0;
  /** Client connection used for contexts opened by the manager itself. */
  client?: RemoteBrowser;
  private readonly server: LaunchedBrowser;
  private readonly allowedPlugins: Set<string> = new Set();

  constructor(init: BrowserSessionInit) {
    this.id = init.id;
    this.server = init.server;
    this.wsEndpoint = init.server.wsEndpoint();
    this.headless = init.headless;
    this.browser = init.browser;
    this.createdAt = init.now;
    this.lastAccessed = init.now;
    this.token = generateSessionToken();
    this.ownerPlugin = init.ownerPlugin;
    this.tenantId = init.tenantId;
    if (init.ownerPlugin) this.allowedPlugins.add(init.ownerPlugin);
  }

  get contextCount(): number {
    return this.contexts.size;
  }

  touch(now: number): void {
    this.lastAccessed = now;
  }

  isExpired(now: number, idleTimeoutMs: number): boolean {
    return now - this.lastAccessed > idleTimeoutMs;
  }

  hasToken(token: string | undefined): boolean {
    return token !== undefined && tokensMatch(this.token, token);
  }

  authorizePlugin(pluginId: string): void {
    this.allowedPlugins.add(pluginId);
  }

  revokePlugin(pluginId: string): void {
    if (pluginId === this.ownerPlugin) return;
    this.allowedPlugins.delete(pluginId);
  }

  /**
   * The token must always match. Without a plugin id the token alone grants
   * access; with one, the plugin must be the owner or explicitly allowed.
   */
  isAuthorized(pluginId: string | undefined, token: string | undefined): boolean {
    if (!this.hasToken(token)) return false;
    if (pluginId === undefined) return true;
    return pluginId === this.ownerPlugin || this.allowedPlugins.has(pluginId);
  }

  toHandle(): SessionHandle {
    return { sessionId: this.id, wsEndpoint: this.wsEndpoint, sessionToken: this.token };
  }

  toInfo(): SessionInfo {
    return {
      sessionId: this.id,
      headless: this.headless,
      browser: this.browser,
      createdAt: this.createdAt,
      lastAccessed: this.lastAccessed,
      contextCount: this.contextCount,
      ...(this.ownerPlugin !== undefined && { ownerPlugin: this.ownerPlugin }),
      ...(this.tenantId !== undefined && { tenantId: this.tenantId }),
      inUse: this.leases > 0,
    };
  }

  /** Closes contexts, the client connection and the browser process. Never throws. */
  async close(): Promise<void> {
    logger.info({ sessionId: this.id }, 'Closing browser session');

    for (const [contextId, context] of this.contexts) {
      try {
        await context.close();
      } catch (err) {
        logger.warn({ sessionId: this.id, contextId, err }, 'Error closing browser context');
      }
    }
    this.contexts.clear();

    if (this.client) {
      try {
        await this.client.close();
      } catch (err) {
        logger.warn({ sessionId: this.id, err }, 'Error closing browser client');
      }
      this.client = undefined;
    }

    try {
      await this.server.close();
    } catch (err) {
      logger.error({ sessionId: this.id, err }, 'Error closing browser process');
    }
  }
}
