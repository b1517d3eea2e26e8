type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const resolveLevel = (value: string | undefined): Level => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
};

const minimumLevel = resolveLevel(process.env.LOG_LEVEL);

const isEnabled = (level: Level): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];

export const formatMessage = (level: Level, message: string, meta?: unknown): string => {
  const timestamp = new Date().toISOString();
  const base = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  if (meta === undefined) {
    return base;
  }
  const metaString = typeof meta === 'string' ? meta : JSON.stringify(meta);
  return `${base} ${metaString}`;
};

export const logger = {
  debug: (message: string, meta?: unknown) => {
    if (isEnabled('debug')) {
      console.debug(formatMessage('debug', message, meta));
    }
  },
  info: (message: string, meta?: unknown) => {
    if (isEnabled('info')) {
      console.log(formatMessage('info', message, meta));
    }
  },
  warn: (message: string, meta?: unknown) => {
    if (isEnabled('warn')) {
      console.warn(formatMessage('warn', message, meta));
    }
  },
  error: (message: string, meta?: unknown) => {
    console.error(formatMessage('error', message, meta));
  }
};

export type Logger = typeof logger;
