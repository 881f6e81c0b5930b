import { PlaywrightLauncher } from './browser/engine.js';
import { BrowserSessionManager } from './browser/session-manager.js';
import { config } from './config.js';
import { browserModules } from './modules/builtin/browser.js';
import { ModuleDispatcher, policyFromConfig } from './modules/dispatcher.js';
import { ModuleRegistry } from './modules/registry.js';
import { buildApp } from './server/app.js';
import { logger } from './utils/logger.js';

export async function main(): Promise<void> {
  // 1. Session pool over playwright-core browser servers
  const sessionManager = new BrowserSessionManager(new PlaywrightLauncher());

  // 2. Registry and dispatcher, bound to the environment resolved at startup
  const registry = new ModuleRegistry();
  for (const definition of browserModules(sessionManager)) {
    registry.register(definition);
  }
  const dispatcher = new ModuleDispatcher(registry, { policy: policyFromConfig() });

  // 3. Build and start the Fastify server
  const app = buildApp({ sessionManager, dispatcher, registry });
  await app.listen({ port: config.port, host: config.host });

  logger.info(
    { url: `http://${config.host}:${config.port}`, environment: dispatcher.environment, modules: registry.size },
    'dispatch server started',
  );

  // 4. Graceful shutdown handler
  let shuttingDown = false;
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully...');

    try {
      await app.close();
    } catch (err) {
      logger.error({ err }, 'Error closing Fastify server');
    }

    try {
      await sessionManager.shutdown();
    } catch (err) {
      logger.error({ err }, 'Error closing browser sessions');
    }

    logger.info('Shutdown complete');
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
