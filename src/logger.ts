import { ConsoleLogger, LogLevel, Logger } from '@slack/logger';

export { LogLevel };
export type { Logger };

const LEVELS: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

export const parseLogLevel = (value: string | undefined): LogLevel =>
  LEVELS[(value ?? '').toLowerCase()] ?? LogLevel.INFO;

/**
 * Create a named console logger, same implementation Bolt uses by default
 */
export const createLogger = (name: string, level: LogLevel = LogLevel.INFO): Logger => {
  const logger = new ConsoleLogger();
  logger.setName(name);
  logger.setLevel(level);
  return logger;
};
