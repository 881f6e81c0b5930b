#!/usr/bin/env node

/**
 * CLI entry point.
 *
 * Usage:
 *   module-dispatch           # Start the HTTP server
 *   module-dispatch --help    # Show help
 */

import { main } from './index.js';
import { logger } from './utils/logger.js';

export const HELP_TEXT = `
module-dispatch: capability-gated module execution with pooled browser sessions

Usage:
  module-dispatch          Start the HTTP server (default: http://127.0.0.1:3000)
  module-dispatch --help   Show this help message

Environment variables:
  DISPATCH_PORT                       Server port (default: 3000)
  DISPATCH_HOST                       Server host (default: 127.0.0.1)
  DISPATCH_ENV                        local|development|staging|production (default: production)
  DISPATCH_API_TOKEN                  Bearer token required by every route except /health
  DISPATCH_CORS_ORIGINS               Comma-separated allowed origins
  DISPATCH_MODULE_DENYLIST            Comma-separated module id globs that may never run (default: shell.*,process.*)
  DISPATCH_MODULE_ALLOWLIST           Comma-separated module id globs; when set, only these run
  DISPATCH_DENY_<ENV>                 Comma-separated capabilities denied in that environment
  DISPATCH_MODULE_TIMEOUT_MS          Default module timeout in ms, 0 disables (default: 30000)
  DISPATCH_MAX_RETRIES                Retries for transient failures (default: 3)
  DISPATCH_RETRY_DELAY_MS             Base retry delay in ms (default: 1000)
  DISPATCH_RETRY_BACKOFF              fixed|exponential (default: exponential)
  DISPATCH_MAX_SESSIONS               Max pooled browser sessions (default: 10)
  DISPATCH_SESSION_IDLE_TIMEOUT_S     Idle seconds before a session is evicted (default: 300)
  DISPATCH_SESSION_SWEEP_INTERVAL_MS  Idle sweep interval in ms, 0 disables (default: 60000)
  DISPATCH_HEADLESS                   Run browsers headless (default: true)
  DISPATCH_BROWSER                    chromium|firefox|webkit (default: chromium)
  DISPATCH_EXECUTABLE_PATH            Custom browser executable path
  DISPATCH_LOG_LEVEL                  silent|debug|info|warn|error (default: info)
`.trim();

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log(HELP_TEXT);
  process.exit(0);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start dispatch server');
  process.exit(1);
});
