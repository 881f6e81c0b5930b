import Fastify, { type FastifyInstance } from 'fastify';
import type { BrowserSessionManager } from '../browser/session-manager.js';
import { config } from '../config.js';
import type { ModuleDispatcher } from '../modules/dispatcher.js';
import type { ModuleRegistry } from '../modules/registry.js';
import { logger } from '../utils/logger.js';
import errorHandler from './middleware/error-handler.js';
import security, { type SecurityOptions } from './middleware/security.js';
import { moduleRoutes } from './routes/modules.js';
import { sessionRoutes } from './routes/sessions.js';

declare module 'fastify' {
  interface FastifyInstance {
    sessionManager: BrowserSessionManager;
    dispatcher: ModuleDispatcher;
    registry: ModuleRegistry;
  }
}

export interface AppDependencies {
  sessionManager: BrowserSessionManager;
  dispatcher: ModuleDispatcher;
  registry: ModuleRegistry;
  security?: SecurityOptions;
}

export function buildApp(deps: AppDependencies): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own pino logger
    disableRequestLogging: true,
  });

  app.decorate('sessionManager', deps.sessionManager);
  app.decorate('dispatcher', deps.dispatcher);
  app.decorate('registry', deps.registry);

  app.register(errorHandler);
  app.register(
    security,
    deps.security ?? {
      corsOrigin: config.corsOrigins,
      apiToken: config.apiToken,
    },
  );

  app.get('/health', async () => {
    return {
      status: 'ok',
      environment: deps.dispatcher.environment,
      sessions: deps.sessionManager.size,
      modules: deps.registry.size,
    };
  });

  app.register(moduleRoutes);
  app.register(sessionRoutes, { prefix: '/sessions' });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'request completed',
    );
    done();
  });

  return app;
}
