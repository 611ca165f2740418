/**
 * Paths pino censors before a line is written.
 * Keyfile material and uploaded archive bytes must never reach a log sink.
 */
export const REDACTION_CONFIG = {
  paths: [
    'keyfile',
    'keyBytes',
    'bytes',
    'secret',
    'token',
    'password',
    '*.keyfile',
    '*.keyBytes',
    '*.bytes',
    '*.secret',
    '*.token',
    'err.keyBytes',
  ],
  censor: '[REDACTED]',
};
