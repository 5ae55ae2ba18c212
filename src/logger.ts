import { LOG_LEVEL, type LogLevel } from './config.js';

type Meta = Record<string, unknown>;

export interface Logger {
  trace: (msg: string, meta?: Meta) => void
  debug: (msg: string, meta?: Meta) => void
  info: (msg: string, meta?: Meta) => void
  warn: (msg: string, meta?: Meta) => void
  error: (msg: string, meta?: Meta) => void
  child: (scope: string) => Logger
}

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

const shouldLog = (threshold: LogLevel, level: LogLevel): boolean => levelOrder[level] >= levelOrder[threshold];

export const formatLine = (level: LogLevel, message: string, scope: string | undefined, meta?: Meta): string => {
  const payload = {
    level,
    time: new Date().toISOString(),
    ...(scope !== undefined ? { scope } : {}),
    msg: message,
    ...meta
  };
  return JSON.stringify(payload);
};

/**
 * JSON-lines logger. Scopes nest with a dot, e.g. `store.csv`.
 */
export const createLogger = (scope?: string, threshold: LogLevel = LOG_LEVEL): Logger => {
  const log = (level: LogLevel, message: string, meta?: Meta): void => {
    if (!shouldLog(threshold, level)) return;
    const line = formatLine(level, message, scope, meta);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    trace: (msg, meta) => { log('trace', msg, meta); },
    debug: (msg, meta) => { log('debug', msg, meta); },
    info: (msg, meta) => { log('info', msg, meta); },
    warn: (msg, meta) => { log('warn', msg, meta); },
    error: (msg, meta) => { log('error', msg, meta); },
    child: (childScope: string) => createLogger(scope === undefined ? childScope : `${scope}.${childScope}`, threshold)
  };
};

export const logger = createLogger();
