import pino from 'pino';

const REDACTED_KEYS = new Set([
  'password',
  'passwordhash',
  'token',
  'secret',
  'jwtsecret',
  'authorization',
  'cookie',
  'email',
  'ip',
  'remoteaddress',
  'body',
]);

function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (REDACTED_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (value instanceof Date) {
      result[key] = value;
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainObject(item) ? sanitize(item) : item));
    } else if (isPlainObject(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Logger whose metadata passes through a key-based redaction filter before
 * reaching pino.
 */
export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta, msg) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(sanitize(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  return wrapPino(
    pino({
      name: opts.name,
      level: opts.level ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
    })
  );
}

export { sanitize as redactLogMeta };
