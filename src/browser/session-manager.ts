import { nanoid } from 'nanoid';
import { config } from '../config.js';
import {
  InvalidSessionTokenError,
  SessionLimitError,
  SessionNotFoundError,
  UnauthorizedAccessError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import type { BrowserLaunchOptions, BrowserLauncher, BrowserName, RemoteBrowser } from './engine.js';
import { BrowserSession, type SessionHandle, type SessionInfo } from './session.js';

export interface SessionManagerOptions {
  maxSessions?: number;
  idleTimeoutSeconds?: number;
  /** 0 disables the background sweep; eviction then only runs on admission. */
  sweepIntervalMs?: number;
  headless?: boolean;
  browser?: BrowserName;
  launchOptions?: BrowserLaunchOptions;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

export interface CreateSessionOptions {
  sessionId?: string;
  headless?: boolean;
  browser?: BrowserName;
  launchOptions?: BrowserLaunchOptions;
  ownerPlugin?: string;
  tenantId?: string;
  signal?: AbortSignal;
}

export interface SessionEndpoint {
  sessionId: string;
  wsEndpoint: string;
}

/**
 * Pools browser processes by session id.
 *
 * The manager owns every process handle; callers only ever see the
 * `{ sessionId, wsEndpoint, sessionToken }` triple. Registration changes
 * (create, close, eviction) run one at a time behind a mutex.
 */
export class BrowserSessionManager<B extends RemoteBrowser = RemoteBrowser> {
  private sessions: Map<string, BrowserSession> = new Map();
  private readonly lock = new Mutex();
  private readonly launcher: BrowserLauncher<B>;
  private readonly maxSessions: number;
  private readonly idleTimeoutMs: number;
  private readonly headless: boolean;
  private readonly browser: BrowserName;
  private readonly launchOptions: BrowserLaunchOptions;
  private readonly now: () => number;
  private sweepInterval: ReturnType<typeof setInterval> | undefined;

  constructor(launcher: BrowserLauncher<B>, options: SessionManagerOptions = {}) {
    this.launcher = launcher;
    this.maxSessions = options.maxSessions ?? config.maxSessions;
    this.idleTimeoutMs = (options.idleTimeoutSeconds ?? config.sessionIdleTimeoutSeconds) * 1000;
    this.headless = options.headless ?? config.headless;
    this.browser = options.browser ?? config.browser;
    this.launchOptions = options.launchOptions ?? {};
    this.now = options.now ?? (() => performance.now());

    const sweepIntervalMs = options.sweepIntervalMs ?? config.sessionSweepIntervalMs;
    if (sweepIntervalMs > 0) {
      this.sweepInterval = setInterval(() => {
        this.sweepIdleSessions().catch((err) => {
          logger.error({ err }, 'Idle session sweep failed');
        });
      }, sweepIntervalMs);

      // Allow the process to exit even if the interval is still active
      this.sweepInterval.unref();
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Launches a new browser for `sessionId`. An id already registered to the
   * same owner is reused instead of launched twice; another owner is refused.
   */
  async createSession(options: CreateSessionOptions = {}): Promise<SessionHandle> {
    return this.lock.runExclusive(() => this.createLocked(options));
  }

  /** Returns the existing session for `sessionId`, launching one only if needed. */
  async getOrCreateSession(
    sessionId: string,
    options: Omit<CreateSessionOptions, 'sessionId'> = {},
  ): Promise<SessionHandle> {
    return this.lock.runExclusive(async () => {
      const existing = this.sessions.get(sessionId);
      const owner = options.ownerPlugin;

      if (existing && (owner === undefined || existing.isAuthorized(owner, existing.token))) {
        existing.touch(this.now());
        return existing.toHandle();
      }

      // A plugin without access to the shared id gets its own scoped session.
      const targetId = existing && owner !== undefined ? `${sessionId}-${owner.slice(0, 8)}` : sessionId;
      return this.createLocked({ ...options, sessionId: targetId });
    });
  }

  /** Read-only lookup; does not extend the session's idle deadline. */
  getSession(sessionId: string): SessionInfo | undefined {
    return this.sessions.get(sessionId)?.toInfo();
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.values()].map((session) => session.toInfo());
  }

  /** Closes and forgets a session. Unknown ids return false. */
  async closeSession(sessionId: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.closeLocked(sessionId));
  }

  /**
   * Holds a lease on the session while `fn` runs. Leased sessions are never
   * evicted, however long they stay idle.
   */
  async withSession<T>(sessionId: string, fn: (handle: SessionHandle) => Promise<T> | T): Promise<T> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    session.leases += 1;
    session.touch(this.now());
    try {
      return await fn(session.toHandle());
    } finally {
      session.leases -= 1;
      session.touch(this.now());
    }
  }

  /**
   * Checks a reattachment request. The token is mandatory; when a plugin id is
   * given it must also be the owner or explicitly authorized.
   */
  verifyAccess(sessionId: string, token: string | undefined, pluginId?: string): SessionEndpoint {
    const session = this.sessions.get(sessionId);
    if (!session || !session.hasToken(token)) {
      throw new InvalidSessionTokenError(sessionId);
    }
    if (!session.isAuthorized(pluginId, token)) {
      logger.warn({ sessionId, pluginId }, 'Unauthorized browser session access attempt');
      throw new UnauthorizedAccessError(`browser_session:${sessionId}`, pluginId);
    }

    session.touch(this.now());
    return { sessionId: session.id, wsEndpoint: session.wsEndpoint };
  }

  async connectToSession(sessionId: string, token: string | undefined, pluginId?: string): Promise<B> {
    const { wsEndpoint } = this.verifyAccess(sessionId, token, pluginId);
    const session = this.requireSession(sessionId);
    return this.launcher.connect(wsEndpoint, session.browser);
  }

  /** Only the owner, presenting its token, may grant access to another plugin. */
  authorizePlugin(sessionId: string, pluginId: string, authorizerPlugin: string, authorizerToken: string): void {
    const session = this.ownedSession(sessionId, authorizerPlugin, authorizerToken, 'authorize');
    session.authorizePlugin(pluginId);
    logger.info({ sessionId, pluginId }, 'Plugin authorized for browser session');
  }

  revokePlugin(sessionId: string, pluginId: string, authorizerPlugin: string, authorizerToken: string): void {
    const session = this.ownedSession(sessionId, authorizerPlugin, authorizerToken, 'revoke');
    session.revokePlugin(pluginId);
    logger.info({ sessionId, pluginId }, 'Plugin access revoked for browser session');
  }

  /** Opens a browser context inside an existing session. */
  async createContext(sessionId: string, contextId?: string): Promise<{ contextId: string }> {
    return this.lock.runExclusive(async () => {
      const session = this.requireSession(sessionId);
      const id = contextId ?? `ctx-${nanoid(8)}`;

      session.client ??= await this.launcher.connect(session.wsEndpoint, session.browser);
      const context = await session.client.newContext();
      session.contexts.set(id, context);
      session.touch(this.now());

      logger.debug({ sessionId, contextId: id, contextCount: session.contextCount }, 'Browser context created');
      return { contextId: id };
    });
  }

  async closeContext(sessionId: string, contextId: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const session = this.sessions.get(sessionId);
      const context = session?.contexts.get(contextId);
      if (!session || !context) return false;

      session.contexts.delete(contextId);
      session.touch(this.now());
      await context.close();
      return true;
    });
  }

  /** Closes every idle-expired session that no caller currently holds. */
  async sweepIdleSessions(): Promise<string[]> {
    return this.lock.runExclusive(() => this.sweepLocked());
  }

  stopSweeper(): void {
    clearInterval(this.sweepInterval);
    this.sweepInterval = undefined;
  }

  async shutdown(): Promise<void> {
    this.stopSweeper();
    await this.lock.runExclusive(async () => {
      logger.info({ count: this.sessions.size }, 'Closing all browser sessions');

      const sessions = [...this.sessions.values()];
      this.sessions.clear();
      await Promise.allSettled(sessions.map((s) => s.close()));
    });
  }

  private async createLocked(options: CreateSessionOptions): Promise<SessionHandle> {
    options.signal?.throwIfAborted();

    const sessionId = options.sessionId ?? `browser-${nanoid(8)}`;
    const existing = this.sessions.get(sessionId);
    if (existing) {
      if (existing.ownerPlugin !== options.ownerPlugin) {
        throw new UnauthorizedAccessError(`browser_session:${sessionId}`, options.ownerPlugin);
      }
      existing.touch(this.now());
      return existing.toHandle();
    }

    if (this.sessions.size >= this.maxSessions) {
      await this.sweepLocked();
      if (this.sessions.size >= this.maxSessions) {
        throw new SessionLimitError(this.maxSessions);
      }
    }

    const browser = options.browser ?? this.browser;
    const headless = options.headless ?? this.headless;
    const server = await this.launcher.launch({
      ...this.launchOptions,
      ...options.launchOptions,
      browser,
      headless,
    });

    // The caller gave up while the process was starting; do not leak it.
    if (options.signal?.aborted) {
      try {
        await server.close();
      } catch (err) {
        logger.error({ sessionId, err }, 'Error closing browser launched for an aborted request');
      }
      options.signal.throwIfAborted();
    }

    const session = new BrowserSession({
      id: sessionId,
      server,
      headless,
      browser,
      now: this.now(),
      ownerPlugin: options.ownerPlugin,
      tenantId: options.tenantId,
    });
    this.sessions.set(sessionId, session);

    logger.info(
      { sessionId, browser, headless, ownerPlugin: options.ownerPlugin, activeSessions: this.sessions.size },
      'Browser session registered',
    );
    return session.toHandle();
  }

  private async closeLocked(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    await session.close();

    logger.info({ sessionId, activeSessions: this.sessions.size }, 'Browser session closed');
    return true;
  }

  private async sweepLocked(): Promise<string[]> {
    const evicted: string[] = [];
    for (const session of [...this.sessions.values()]) {
      // Re-read: an earlier close in this loop may have let a caller take a lease.
      if (session.leases > 0 || !session.isExpired(this.now(), this.idleTimeoutMs)) continue;

      logger.info({ sessionId: session.id }, 'Browser session idle, evicting');
      if (await this.closeLocked(session.id)) evicted.push(session.id);
    }
    return evicted;
  }

  private requireSession(sessionId: string): BrowserSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private ownedSession(sessionId: string, ownerPlugin: string, token: string, action: string): BrowserSession {
    const session = this.sessions.get(sessionId);
    if (!session || !session.hasToken(token)) {
      throw new InvalidSessionTokenError(sessionId);
    }
    if (session.ownerPlugin === undefined || session.ownerPlugin !== ownerPlugin) {
      throw new UnauthorizedAccessError(`browser_session:${sessionId}:${action}`, ownerPlugin);
    }
    return session;
  }
}
