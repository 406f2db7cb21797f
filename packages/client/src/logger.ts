import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** Defaults to $TASKSYNC_LOG_LEVEL, then "info" */
  level?: string;
  enabled?: boolean;
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino({
    name,
    level: options.level ?? process.env.TASKSYNC_LOG_LEVEL ?? 'info',
    enabled: options.enabled ?? true,
  });
}
