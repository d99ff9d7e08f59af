import type { AppConfig } from '../../shared/config';

type LogLevel = AppConfig['observability']['logLevel'];

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
}

const MAX_LOGGED_URL_CHARS = 200;

/**
 * Makes a URL safe to log: query masked, fragment dropped, control characters removed, length capped.
 */
export const redactUrl = (url: string | null | undefined, maxChars = MAX_LOGGED_URL_CHARS): string => {
  let out = String(url ?? '')
    .replace(/[\r\n\t]+/g, ' ')
    .trim();
  if (URL.canParse(out)) {
    const parsed = new URL(out);
    if (parsed.protocol && parsed.host) {
      const query = parsed.search ? '?…' : '';
      out = `${parsed.protocol}//${parsed.host}${parsed.pathname}${query}`;
    }
  }
  out = out.replace(/\s+/g, ' ').trim();
  if (out.length <= maxChars) {
    return out;
  }
  return `${out.slice(0, maxChars).trimEnd()}…`;
};

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

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger => {
  const threshold = levelWeights[config.observability.logLevel];
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) emit('debug', message, meta);
    },
    info: (message, meta) => {
      if (shouldLog('info')) emit('info', message, meta);
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) emit('warn', message, meta);
    },
    error: (message, meta) => emit('error', message, meta),
  };
};
