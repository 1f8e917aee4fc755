import type { AppConfig } from '../../shared/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  child: (context: Record<string, unknown>) => Logger;
}

const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, context: Record<string, unknown>): Logger => {
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  const withContext = (meta?: Record<string, unknown>) => ({ ...context, ...meta });
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) emit('debug', message, withContext(meta));
    },
    info: (message, meta) => {
      if (shouldLog('info')) emit('info', message, withContext(meta));
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) emit('warn', message, withContext(meta));
    },
    error: (message, meta) => emit('error', message, withContext(meta)),
    child: (extra) => buildLogger(threshold, { ...context, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

export const createSilentLogger = (): Logger => {
  const silent: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silent,
  };
  return silent;
};
