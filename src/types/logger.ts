/**
 * Logger interface for dependency injection.
 *
 * Minimal subset of Pino's API, so components can take a logger
 * without coupling to Pino directly.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;
  fatal(obj: object, msg?: string): void;
  fatal(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}
