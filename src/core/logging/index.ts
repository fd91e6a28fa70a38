export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { PinoLoggerFactory, resolveLogLevel } from './create-logger.js';
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
export { REDACTION_CONFIG } from './redaction.js';
