import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  name?: string | undefined;
  level?: pino.LevelWithSilent | undefined;
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      level: process.env.NODE_ENV === 'production' ? 'warn' : 'info',
      base: null,
    });
  }
  return rootLogger;
}

/**
 * Child of the shared root logger, tagged with the component name.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = getRootLogger().child({ name: options.name ?? 'archive' });
  if (options.level) {
    logger.level = options.level;
  }
  return logger;
}
