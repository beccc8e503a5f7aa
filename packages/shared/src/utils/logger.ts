import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:HH:MM:ss.l',
    ignore: 'pid,hostname',
  },
};

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'diskwatch', level = 'info', pretty = false } = options;

  return pino({
    name,
    level,
    transport: pretty ? prettyTransport : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  });
}

/** Level named by `value`, or `fallback` when it is missing or unknown. */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({
      level: parseLogLevel(process.env.DISKWATCH_LOG_LEVEL),
      pretty: process.env.NODE_ENV !== 'production',
    });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}

/**
 * Change the level of the shared logger in place. Modules hold on to the
 * instance returned by `getLogger()` at import time, so replacing it would
 * not reach them.
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}
