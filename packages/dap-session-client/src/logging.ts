/**
 * Structured logger accepted by every class of the session client.
 * The signatures match pino, so a pino instance can be passed as is.
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

  fatal?(message: string, ...args: unknown[]): void;
  fatal?(obj: object, message?: string, ...args: unknown[]): void;

  /** Returns a logger that adds `bindings` to every record. */
  child?(bindings: Record<string, unknown>): LoggerInterface;
}

export function componentLogger(
  logger: LoggerInterface,
  component: string,
): LoggerInterface {
  return logger.child ? logger.child({ component }) : logger;
}
