/**
 * Interface for a structured logger.
 * The proxy library never creates a logger itself; the server injects one (pino).
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

  /**
   * Logs a message at the 'fatal' level (often implies process exit).
   */
  fatal?(message: string, ...args: unknown[]): void;
  fatal?(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Creates a child logger with additional bound context.
   * @param bindings Properties bound to every line the child writes.
   */
  child?(bindings: Record<string, unknown>): LoggerInterface;
}

/**
 * Returns a child logger bound to `bindings` when the logger supports it,
 * otherwise the logger itself.
 */
export function childLogger(
  logger: LoggerInterface,
  bindings: Record<string, unknown>,
): LoggerInterface {
  return logger.child ? logger.child(bindings) : logger;
}

/**
 * Shortens a wire payload for log lines.
 */
export function preview(text: string, max: number = 150): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}
