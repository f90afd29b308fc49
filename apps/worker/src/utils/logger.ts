import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const logger = pino({
  name: 'redline',
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Applies the validated level. Children created afterwards inherit it.
 */
export function configureLogger(level: LogLevel): void {
  logger.level = level;
}
