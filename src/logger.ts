import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

// Notebook bodies and image bytes never reach the log stream.
const REDACT_PATHS = [
  'payload',
  'artifact',
  'notebook',
  'req.body',
  'reply.body',
  '*.payload',
  '*.artifact',
  '*.notebook',
];

export function createLogger(name: string, level: LevelWithSilent = 'info'): Logger {
  return pino({
    name,
    level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
