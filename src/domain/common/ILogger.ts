/** Severity, most to least urgent. A logger set to a level drops everything below it. */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Structured fields attached to one entry, such as `taskId` or `workflowId`. */
export type LogMetadata = Record<string, unknown>;

/**
 * Logging port used by services, repositories and adapters.
 */
export interface ILogger {
  /** The error's message and stack are attached to the entry when given. */
  error(message: string, error?: Error, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  debug(message: string, meta?: LogMetadata): void;

  /** Logger that adds `context` to every entry it writes. */
  child?(context: LogMetadata): ILogger;

  setLevel?(level: LogLevel): void;
}
