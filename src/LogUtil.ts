import type { TransformableInfo } from 'logform';
import type { Logger } from 'winston';
import { createLogger, format, transports } from 'winston';

export const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ] as const;

/**
 * Different log levels, from most important to least important.
 */
export type LogLevel = typeof LOG_LEVELS[number];

const loggers: Logger[] = [];

// eslint-disable-next-line import/no-mutable-exports
export let GLOBAL_LOG_LEVEL: LogLevel = 'info';
export function setLogLevel(level: LogLevel): void {
  GLOBAL_LOG_LEVEL = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

export function getLogger(label: string): Logger {
  const formats = [
    format.label({ label }),
    ...(process.stderr.isTTY ? [ format.colorize() ] : []),
    format.printf(
      ({ level, message, label: labelInner }: TransformableInfo): string =>
        `[${String(labelInner)}] ${level}: ${String(message)}`,
    ),
  ];
  const logger = createLogger({
    level: GLOBAL_LOG_LEVEL,
    format: format.combine(...formats),
    // Formulas can be written to stdout, so every level goes to stderr
    transports: [ new transports.Console({ stderrLevels: [ ...LOG_LEVELS ]}) ],
  });

  loggers.push(logger);

  return logger;
}
