import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * OPHYS_CACHE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: warn (compatibility opt-outs and cache repairs stay visible)
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env['OPHYS_CACHE_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'warn';
}

/**
 * Root pino logger: JSON on stderr, sync, so library output never
 * interleaves with a host program's stdout.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
