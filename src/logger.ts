import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info';

  if (options.pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    });
  }

  return pino({ level });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
