import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs BEFORE the container is initialized
 * (config loading, container setup, contexts built without DI).
 *
 * After the container is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

function bootstrapLevel(): LogLevel {
  const raw = process.env['OWNKIT_LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'silent';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(bootstrapLevel());
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
