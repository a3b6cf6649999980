interface LogMeta {
  [key: string]: unknown;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (meta: LogMeta) => Logger;
};

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function minimumLevel(): Level {
  const raw = process.env.LOG_LEVEL;
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

export function createLogger(component: string, bound: LogMeta = {}): Logger {
  const threshold = LEVEL_ORDER[minimumLevel()];

  const log = (level: Level, message: string, meta: LogMeta = {}) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const payload = {
      level,
      component,
      message,
      timestamp: new Date().toISOString(),
      ...bound,
      ...meta,
    };
    const line = JSON.stringify(payload);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (meta) => createLogger(component, { ...bound, ...meta }),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return `${error}`;
}
