import 'reflect-metadata';
import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import { DI } from '../../di/tokens.js';

/**
 * Root pino logger: JSON lines, ISO timestamps, synchronous writes to stderr so
 * log output never interleaves with whatever the host prints on stdout.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
