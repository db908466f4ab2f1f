export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
};

export type LogSink = (level: LogLevel, line: string) => void;

export type LoggerOptions = {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: 'Failed to serialize log payload' });
  }
};

const serializeMeta = (meta: LogMeta | undefined): LogMeta => {
  if (!meta) return {};
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;

  const log = (entryLevel: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_WEIGHT[entryLevel] < LEVEL_WEIGHT[level]) return;
    const payload = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      ...(options.scope ? { scope: options.scope } : {}),
      message,
      ...serializeMeta(meta),
    };
    sink(entryLevel, safeStringify(payload));
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (scope) =>
      createLogger({ ...options, scope: options.scope ? `${options.scope}:${scope}` : scope }),
  };
};

export const createNullLogger = (): Logger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => createNullLogger(),
});
