import type { Logger } from './types.js';
import { createRootLogger } from './create-logger.js';
import { loadConfig } from '../../config/app-config.js';

/**
 * Logger for code that runs without the DI container (a `ServiceLocator` built by
 * hand, early host start-up). Falls back to `silent` when the environment is invalid;
 * the container reports configuration errors itself.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const level = loadConfig({ env: process.env }).match(
      (config) => config.logging.level,
      () => 'silent' as const
    );
    _bootstrapLogger = createRootLogger(level);
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
