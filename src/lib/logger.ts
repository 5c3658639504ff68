/**
 * Environ Digest — Logger
 *
 * Structured logging for pipeline diagnostics.
 * JSON lines in production, short human-readable lines otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL ?? 'info';
let currentLevelNum = isLogLevel(envLevel) ? LOG_LEVELS[envLevel] : LOG_LEVELS.info;

/**
 * Override the level picked up from LOG_LEVEL at startup.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelNum = LOG_LEVELS[level];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Run an async operation and log its duration at debug level.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    logger.debug(`${name} completed`, {
      durationMs: Math.round(performance.now() - start),
    });
  }
}
