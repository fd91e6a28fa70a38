/**
 * Redaction configuration for pino.
 *
 * Object-store credentials travel through config objects; never log them.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'accessKeyId',
    'secretAccessKey',
    'sessionToken',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.secretAccessKey',
    '*.sessionToken',

    'remote.accessKeyId',
    'remote.secretAccessKey',
    'remote.sessionToken',

    'headers.authorization',
    'headers.Authorization',
  ] as string[],
  censor: '[REDACTED]',
};
