import { ConsoleLogger, LogLevel } from '@slack/logger';
import type { Logger } from '@slack/logger';

export { LogLevel };
export type { Logger };

/**
 * Create a named console logger. The same instance is handed to Bolt so the
 * ledger and the Slack adapter share one output format.
 */
export const createLogger = (name: string, level: LogLevel = LogLevel.INFO): Logger => {
  const logger = new ConsoleLogger();
  logger.setName(name);
  logger.setLevel(level);
  return logger;
};
