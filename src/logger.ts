import { pino, type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Process-wide structured logger. `LOG_LEVEL` wins over the configured
 * level so verbosity can be raised without editing the config file.
 */
export const logger: Logger = pino({
  name: 'mqtt-influx-bridge',
  level: process.env.LOG_LEVEL || 'info',
});

export function setLogLevel(level: LogLevel | undefined): void {
  if (level && !process.env.LOG_LEVEL) {
    logger.level = level;
  }
}
