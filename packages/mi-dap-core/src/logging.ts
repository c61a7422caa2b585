/**
 * Structured logger accepted by every component. Each level takes either a
 * message or a context object followed by a message, the way pino does.
 */
export interface LoggerInterface {
  trace(message: string, ...args: unknown[]): void;
  trace(obj: object, message?: string, ...args: unknown[]): void;

  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;

  /** Used right before the adapter exits. */
  fatal?(message: string, ...args: unknown[]): void;
  fatal?(obj: object, message?: string, ...args: unknown[]): void;

  /** A logger that adds `bindings` to every entry. */
  child?(bindings: Record<string, unknown>): LoggerInterface;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Returns `logger.child(bindings)` when the logger supports child loggers,
 * otherwise the logger itself.
 */
export function childLogger(
  logger: LoggerInterface,
  bindings: Record<string, unknown>,
): LoggerInterface {
  return logger.child ? logger.child(bindings) : logger;
}

/**
 * Creates a logger writing to stderr. Stdout is reserved for the
 * `SOCKET_PATH=` handshake line read by the client that launched the adapter.
 */
export function createStderrLogger(
  minLevel: LogLevel = 'info',
  parentContext: Record<string, unknown> = {},
): LoggerInterface {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const context = JSON.stringify(parentContext);

  const write =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) {
        return;
      }
      console.error(`[${level.toUpperCase()}]`, context, ...args);
    };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
    child: (bindings: Record<string, unknown>): LoggerInterface =>
      createStderrLogger(minLevel, { ...parentContext, ...bindings }),
  };
}
