import pino from 'pino';

const PII_KEYS = new Set([
  'password',
  'token',
  'accesstoken',
  'credential',
  'secret',
  'email',
  'ip',
  'remoteaddress',
  'authorization',
  'cookie',
  'content',
  'description',
  'body',
]);

export function isPiiKey(key: string): boolean {
  return PII_KEYS.has(key.toLowerCase());
}

function sanitizeValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Set) {
    return [...value].map(sanitizeValue);
  }
  if (value !== null && typeof value === 'object') {
    return sanitize(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

export function sanitize(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = isPiiKey(key) ? '[REDACTED]' : sanitizeValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info: (meta, msg) => logger.info(sanitize(meta), msg),
    warn: (meta, msg) => logger.warn(sanitize(meta), msg),
    error: (meta, msg) => logger.error(sanitize(meta), msg),
    debug: (meta, msg) => logger.debug(sanitize(meta), msg),
    fatal: (meta, msg) => logger.fatal(sanitize(meta), msg),
    child: (bindings) => wrapPino(logger.child(sanitize(bindings))),
  };
}

export interface LoggerOptions {
  name: string;
  level?: string;
}

export function createLogger(opts: LoggerOptions): SafeLogger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  return wrapPino(
    pino({
      name: opts.name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    }),
  );
}
