import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  readonly level?: string;
}

const rootLogger: Logger = pino({
  base: { service: 'bench-monitor' },
  level: process.env.LOG_LEVEL ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime
});

export const logger = rootLogger;

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const child = rootLogger.child({ module: name });
  if (options.level) {
    child.level = options.level;
  }
  return child;
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
