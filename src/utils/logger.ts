import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') return raw;
  // keep test output quiet unless asked otherwise
  return process.env.VITEST ? 'silent' : 'info';
}

let baseLogger: pino.Logger | undefined;
let configuredLevel: LogLevel | undefined;

function base(): pino.Logger {
  baseLogger ??= pino({
    level: getLogLevel(),
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
  return baseLogger;
}

function wrap(logger: pino.Logger): Logger {
  const emit = (level: 'debug' | 'info' | 'warn' | 'error') =>
    (message: string, data?: Record<string, unknown>) => {
      if (data) logger[level](data, message);
      else logger[level](message);
    };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (bindings) => wrap(logger.child(bindings))
  };
}

/** Sets the level of loggers created from now on, e.g. from loaded config. */
export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
  if (baseLogger) baseLogger.level = level;
}

export function getLogLevel(): LogLevel {
  return configuredLevel ?? resolveLevel();
}

export function createLogger(component: string): Logger {
  return wrap(base().child({ component }));
}
