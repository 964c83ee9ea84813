// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Bootstrap (for code outside the container)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
