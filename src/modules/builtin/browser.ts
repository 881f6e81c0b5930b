import { isBrowserName } from '../../browser/engine.js';
import type { BrowserSessionManager } from '../../browser/session-manager.js';
import { AppError, SessionNotFoundError, UnauthorizedAccessError } from '../../utils/errors.js';
import { Capability } from '../capabilities.js';
import { ErrorCode } from '../codes.js';
import { InvalidTypeError, InvalidValueError, ModuleError, NotFoundError, ValidationError } from '../errors.js';
import type { ModuleDefinition } from '../registry.js';
import type { ModuleContext, ModuleParams } from '../runtime.js';

function optionalString(params: ModuleParams, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidTypeError(`Parameter '${key}' must be a string`, {
      field: key,
      expectedType: 'string',
      actualType: typeof value,
    });
  }
  return value;
}

function optionalBoolean(params: ModuleParams, key: string): boolean | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidTypeError(`Parameter '${key}' must be a boolean`, {
      field: key,
      expectedType: 'boolean',
      actualType: typeof value,
    });
  }
  return value;
}

/** Session-manager errors surface to callers as module failures with a stable code. */
function toModuleError(err: unknown): unknown {
  if (err instanceof SessionNotFoundError) {
    return new NotFoundError(err.message, { resource: 'browser_session' });
  }
  if (err instanceof UnauthorizedAccessError) {
    return new ModuleError(err.message, { code: ErrorCode.FORBIDDEN, details: { resource: err.resource } });
  }
  if (err instanceof AppError) {
    return new ModuleError(err.message, { details: { reason: err.code } });
  }
  return err;
}

/** `browser.session`: ensures a pooled browser exists and returns its reattachment triple. */
export function browserSessionModule(manager: BrowserSessionManager): ModuleDefinition {
  return {
    id: 'browser.session',
    description: 'Launch or reuse a pooled browser session',
    capabilities: [Capability.BROWSER_CONTROL],
    run: async ({ params, signal }: ModuleContext) => {
      const sessionId = optionalString(params, 'session_id');
      const ownerPlugin = optionalString(params, 'owner_plugin');
      const tenantId = optionalString(params, 'tenant_id');
      const headless = optionalBoolean(params, 'headless');
      const browserParam = optionalString(params, 'browser');

      if (browserParam !== undefined && !isBrowserName(browserParam)) {
        throw new InvalidValueError(`Unsupported browser: ${browserParam}`, {
          field: 'browser',
          allowedValues: ['chromium', 'firefox', 'webkit'],
        });
      }
      const browser = browserParam !== undefined && isBrowserName(browserParam) ? browserParam : undefined;
      const options = { headless, browser, ownerPlugin, tenantId, signal };

      try {
        const handle =
          sessionId === undefined
            ? await manager.createSession(options)
            : await manager.getOrCreateSession(sessionId, options);
        return {
          ok: true,
          data: {
            session_id: handle.sessionId,
            ws_endpoint: handle.wsEndpoint,
            session_token: handle.sessionToken,
          },
        };
      } catch (err) {
        throw toModuleError(err);
      }
    },
  };
}

export function browserSessionCloseModule(manager: BrowserSessionManager): ModuleDefinition {
  return {
    id: 'browser.session.close',
    description: 'Close a pooled browser session',
    capabilities: [Capability.BROWSER_CONTROL],
    run: async ({ params, signal }: ModuleContext) => {
      const sessionId = optionalString(params, 'session_id');
      if (sessionId === undefined) {
        throw new ValidationError("Missing required parameter 'session_id'", { field: 'session_id' });
      }
      signal.throwIfAborted();

      const closed = await manager.closeSession(sessionId);
      return { ok: true, data: { session_id: sessionId, closed } };
    },
  };
}

export function browserModules(manager: BrowserSessionManager): ModuleDefinition[] {
  return [browserSessionModule(manager), browserSessionCloseModule(manager)];
}
