/**
 * Structured logging for Tideway streams.
 *
 * A logger carries a module path (`tideway:live`, `orders:fetch`) and a bound
 * context. Query factories bind the query once, and a subscription machine
 * binds its token as soon as it is known, so every entry a stream writes can
 * be attributed to its subscription without each call site repeating it.
 * Nothing is written unless a handler is configured.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields attached to every entry a logger writes */
export type LogContext = Readonly<Record<string, unknown>>;

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface TidewayLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Receives every entry at or above the level */
  readonly handler?: (entry: LogEntry) => void;
  /** Context bound to every entry */
  readonly context?: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all Tideway loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger handed to streams, gates and engines.
 *
 * @example
 * ```typescript
 * const log = new TidewayLogger({
 *   module: 'orders-feed',
 *   level: 'debug',
 *   handler: (entry) => console.log(JSON.stringify(entry)),
 * });
 *
 * // Entries from this stream carry { query } and, once subscribed, { token }
 * const changes = new QueryStreams(engine, { logger: log }).live('SELECT * FROM orders');
 * ```
 */
export class TidewayLogger {
  private readonly level: LogLevel;
  private readonly handler: ((entry: LogEntry) => void) | undefined;

  /** Module name of this logger */
  readonly module: string;
  /** Context bound to every entry this logger writes */
  readonly context: LogContext;

  constructor(config: TidewayLoggerConfig = {}) {
    this.level = config.debug ? 'debug' : (config.level ?? 'info');
    this.handler = config.handler;
    this.module = config.module ?? 'tideway';
    this.context = config.context ?? {};
  }

  /** Logger for a sub-module, optionally binding more context */
  child(subModule: string, context?: LogContext): TidewayLogger {
    return this.derive(`${this.module}:${subModule}`, context);
  }

  /** Logger for the same module with `context` bound on top of the current one */
  bind(context: LogContext): TidewayLogger {
    return this.derive(this.module, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  private derive(module: string, context: LogContext | undefined): TidewayLogger {
    return new TidewayLogger({
      level: this.level,
      module,
      handler: this.handler,
      context: context ? { ...this.context, ...context } : this.context,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.handler) return;
    const effectiveLevel = globalDebug ? 'debug' : this.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const merged = { ...this.context, ...context };
    this.handler({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });
  }
}

/** Logger used when a component is given none */
export const silentLogger: TidewayLogger = new TidewayLogger();
