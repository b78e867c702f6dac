import pino from 'pino';

/**
 * Default logger for machines created without one.
 * `LOG_LEVEL` controls verbosity (trace, debug, info, warn, error, fatal, silent).
 */
export const logger = pino({
  name: 'fsm',
  level: process.env.LOG_LEVEL ?? 'info',
});
