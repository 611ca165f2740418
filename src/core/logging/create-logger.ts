import pino from 'pino';
import type { DestinationStream } from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * HARBORMASTER_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Unset means silent; the CLI passes its own default.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined>,
  fallback: LogLevel = 'silent'
): LogLevel {
  const level = env['HARBORMASTER_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : fallback;
}

export interface RootLoggerOptions {
  readonly level: LogLevel;
  /** Defaults to sync stderr. Tests pass an in-memory stream. */
  readonly destination?: DestinationStream;
}

export function createRootLogger(options: RootLoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // stdout belongs to CLI output
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Component logger factory, singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Logging.Level) level: LogLevel) {
    this._root = createRootLogger({ level });
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
