import type { Logger } from './types.js';
import { createRootLogger, resolveLogLevel } from './create-logger.js';

/**
 * Logger for code that runs before the DI container exists
 * (container wiring itself, config load failures).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger({ level: resolveLogLevel(process.env) });
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
