/**
 * Log level type
 */
export type LogLevel = "info" | "warn" | "error";

/**
 * Migration operation a log line belongs to
 */
export type LogOperation = "up" | "down" | "migrate" | "rollback" | "reset";

/**
 * Log data input structure (without level, which is determined by the method called)
 */
export interface LogDataInput {
  migration?: string;
  operation?: LogOperation;
  message: string;
  error?: unknown;
}

/**
 * Complete log data structure (with level)
 */
export interface LogData extends LogDataInput {
  level: LogLevel;
}

/**
 * Logger interface used by the migrator, the ledger and migration units
 */
export interface Logger {
  info: (data: LogDataInput) => void;
  error: (data: LogDataInput) => void;
  warn: (data: LogDataInput) => void;
}

/**
 * Build a log prefix such as `[2020_01_01_000000_create_users_table] [up] `
 */
export function buildLogPrefix(data: LogDataInput): string {
  const parts: string[] = [];

  if (data.migration) {
    parts.push(`[${data.migration}]`);
  }

  if (data.operation) {
    parts.push(`[${data.operation}]`);
  }

  return parts.length > 0 ? `${parts.join(" ")} ` : "";
}

/**
 * Abstract base logger class that implements the Logger interface
 */
export abstract class BaseLogger implements Logger {
  abstract info(data: LogDataInput): void;

  abstract error(data: LogDataInput): void;

  abstract warn(data: LogDataInput): void;

  /**
   * Create a logger that fills in migration and operation when a call leaves them out
   */
  createPrefixed(prefix: {
    migration?: string;
    operation?: LogOperation;
  }): Logger {
    return new PrefixedLogger(this, prefix);
  }
}

/**
 * Console logger implementation
 */
export class ConsoleLogger extends BaseLogger {
  info(data: LogDataInput): void {
    // eslint-disable-next-line no-console
    console.log(`${buildLogPrefix(data)}${data.message}`);
  }

  error(data: LogDataInput): void {
    const line = `${buildLogPrefix(data)}${data.message}`;

    if (data.error === undefined) {
      // eslint-disable-next-line no-console
      console.error(line);
      return;
    }

    // eslint-disable-next-line no-console
    console.error(line, data.error);
  }

  warn(data: LogDataInput): void {
    // eslint-disable-next-line no-console
    console.warn(`${buildLogPrefix(data)}${data.message}`);
  }
}

/**
 * Logger that can be switched off, mostly so unit tests stay quiet
 */
export class MutableLogger extends BaseLogger {
  private baseLogger: Logger;
  private verbose: boolean;

  /**
   * @param baseLogger The logger that receives calls while verbose is on
   * @param verbose Whether to forward calls (defaults to true)
   */
  constructor(baseLogger: Logger, verbose: boolean = true) {
    super();
    this.baseLogger = baseLogger;
    this.verbose = verbose;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  info(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.info(data);
    }
  }

  error(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.error(data);
    }
  }

  warn(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.warn(data);
    }
  }
}

/**
 * Prefixed logger that adds migration and operation information to log calls
 * @internal
 */
export class PrefixedLogger extends BaseLogger {
  private baseLogger: Logger;
  private prefix: { migration?: string; operation?: LogOperation };

  constructor(
    baseLogger: Logger,
    prefix: { migration?: string; operation?: LogOperation },
  ) {
    super();
    this.baseLogger = baseLogger;
    this.prefix = prefix;
  }

  private withPrefix(data: LogDataInput): LogDataInput {
    return {
      ...data,
      migration: data.migration || this.prefix.migration,
      operation: data.operation || this.prefix.operation,
    };
  }

  info(data: LogDataInput): void {
    this.baseLogger.info(this.withPrefix(data));
  }

  error(data: LogDataInput): void {
    this.baseLogger.error(this.withPrefix(data));
  }

  warn(data: LogDataInput): void {
    this.baseLogger.warn(this.withPrefix(data));
  }
}

/**
 * Default console logger instance
 */
export const consoleLogger: Logger = new ConsoleLogger();

/**
 * Create a logger that prefills migration and operation information.
 * Works for plain object loggers as well as BaseLogger subclasses.
 */
export function createPrefixedLogger(
  baseLogger: Logger,
  prefix: { migration?: string; operation?: LogOperation },
): Logger {
  if (baseLogger instanceof BaseLogger) {
    return baseLogger.createPrefixed(prefix);
  }

  return new PrefixedLogger(baseLogger, prefix);
}
