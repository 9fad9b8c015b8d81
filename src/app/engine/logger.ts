// ─── Engine Logger ───────────────────────────────────────────────────────────
// Tagged console logging: every line is prefixed with "[Tag]" so provider
// output can be grepped per source ("[NSE]", "[MunafaSutra]", "[Yahoo]", ...).

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Derive a logger with a different tag and the same level */
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  const emit = (
    lvl: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    meta?: Record<string, unknown>,
  ): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    if (meta && Object.keys(meta).length > 0) sink(prefix, message, meta);
    else sink(prefix, message);
  };

  return {
    debug: (message, meta) => emit('debug', console.debug, message, meta),
    info:  (message, meta) => emit('info', console.log, message, meta),
    warn:  (message, meta) => emit('warn', console.warn, message, meta),
    error: (message, meta) => emit('error', console.error, message, meta),
    child: (childTag) => createLogger(childTag, level),
  };
}

/** Logger that drops everything (tests, embedding callers with their own logging) */
export const silentLogger: Logger = createLogger('silent', 'silent');
