import pino from 'pino';
import type { Logger } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { resolveLogLevel } from './create-logger.js';

/**
 * Bootstrap logger for code that runs before the container is built
 * (config loading, compatibility file parsing).
 *
 * After bootstrap, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: resolveLogLevel(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
