/**
 * Logging seam for adapters.
 *
 * Adapters never write anywhere on their own: they hold a Logger that
 * defaults to `silentLogger`, and the caller swaps in a real one through
 * `setLogger`.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger("debug").child({ provider: "openai" });
 * logger.debug("Headers prepared"); // -> "[provider=openai] Headers prepared"
 * ```
 */

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

export const LogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  SILENT: "silent",
} as const satisfies Record<string, string>;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** Log an error with optional context. */
  error(error: Error, message?: string): void;
  /** A logger that prefixes every message with `bindings`. */
  child(bindings: Record<string, unknown>): Logger;
}

/** Writes to the console, dropping messages below `level`. */
export class ConsoleLogger implements Logger {
  constructor(readonly level: LogLevel = LogLevel.WARN) {}

  debug(message: string): void {
    if (this.enabled(LogLevel.DEBUG)) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled(LogLevel.INFO)) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled(LogLevel.WARN)) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string): void {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string): void {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string): void {
    this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(" ");
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

const noop = (): void => {};

/** Discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
