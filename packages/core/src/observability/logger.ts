/**
 * Structured logging.
 *
 * A logger is silent until it is given a handler. Containers never log;
 * views, the view manager and exclusive-access guards log through the
 * logger passed in their options.
 *
 * @module observability/logger
 */

import { RippleError } from '../errors/ripple-error.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Error summary attached to `error` entries */
export interface LoggedError {
  readonly name: string;
  readonly message: string;
  /** Present for {@link RippleError}s */
  readonly code?: string;
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  /** Module path, e.g. `views:open-orders` */
  readonly module: string;
  readonly context?: Record<string, unknown>;
  /** Set on entries written by {@link RippleLogger.time} */
  readonly durationMs?: number;
  readonly error?: LoggedError;
}

export type LogHandler = (entry: LogEntry) => void;

export interface RippleLoggerConfig {
  /** Module path; children append `:<name>` (default: `"ripplekit"`) */
  readonly module?: string;
  /** Lowest level passed to the handler (default: `"info"`) */
  readonly level?: LogLevel;
  /** Receives every entry at or above `level` */
  readonly handler?: LogHandler;
}

/** Summarize anything thrown into a {@link LoggedError} */
export function describeError(error: unknown): LoggedError {
  if (error instanceof RippleError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'NonError', message: String(error) };
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'views', level: 'debug', handler: (e) => sink.push(e) });
 *
 * const end = log.child('open-orders').time('refresh');
 * // ... rebuild ...
 * end({ count: 12 }); // debug "refresh completed", module "views:open-orders", durationMs
 * ```
 */
export class RippleLogger {
  readonly module: string;
  readonly level: LogLevel;
  private readonly handler: LogHandler | undefined;

  constructor(config: RippleLoggerConfig = {}) {
    this.module = config.module ?? 'ripplekit';
    this.level = config.level ?? 'info';
    this.handler = config.handler;
  }

  /** Whether an entry at `level` would reach the handler */
  isEnabled(level: LogLevel): boolean {
    return (
      this.handler !== undefined && LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level)
    );
  }

  /** Logger for a sub-module, sharing this logger's level and handler */
  child(name: string): RippleLogger {
    return new RippleLogger({
      module: `${this.module}:${name}`,
      level: this.level,
      handler: this.handler,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, { context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, { context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, { context });
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.emit('error', message, {
      context,
      error: error === undefined ? undefined : describeError(error),
    });
  }

  /**
   * Start timing `operation`. The returned callback writes a debug entry
   * `"<operation> completed"` carrying `durationMs`. When debug entries are
   * disabled the callback does nothing and no clock is read.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    if (!this.isEnabled('debug')) return () => undefined;

    const start = performance.now();
    return (context) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.emit('debug', `${operation} completed`, { context, durationMs });
    };
  }

  private emit(
    level: LogLevel,
    message: string,
    extra: Pick<LogEntry, 'context' | 'durationMs' | 'error'>
  ): void {
    if (!this.handler || !this.isEnabled(level)) return;

    this.handler({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(extra.context ? { context: extra.context } : {}),
      ...(extra.durationMs !== undefined ? { durationMs: extra.durationMs } : {}),
      ...(extra.error ? { error: extra.error } : {}),
    });
  }
}

export function createLogger(config?: RippleLoggerConfig): RippleLogger {
  return new RippleLogger(config);
}
