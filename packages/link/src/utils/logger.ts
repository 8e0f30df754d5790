export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogData = Record<string, unknown>;

interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  scope: string | undefined;
  message: string;
  timestamp: string;
  data?: LogData | undefined;
}

/**
 * Minimal structured logger shared by the link, simulator and monitor.
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minLevel: LogLevel = 'info';

/**
 * Set the lowest level that is written. Applies to every scoped logger.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatLog(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}${scope}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function write(
  level: Exclude<LogLevel, 'silent'>,
  scope: string | undefined,
  message: string,
  data?: LogData
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }
  const line = formatLog({ level, scope, message, timestamp: new Date().toISOString(), data });
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Create a logger whose lines carry a scope tag, e.g. `[link:4711]`.
 */
export function createLogger(scope?: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
  };
}

export const logger: Logger = createLogger();
