/**
 * Structured logging for quipkeep.
 *
 * Zero-dependency structured logger with levels, JSON output and module
 * prefixes. Silent unless a handler is configured, JSON output or debug
 * is enabled. Listeners registered with {@link Logger.observe} see every
 * entry of a logger and its children, including those below the level.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

export type LogListener = (entry: LogEntry) => void;

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Log everything and write it to the console (overrides level) */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console, only with `json` or `debug`) */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger for quipkeep modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'export', level: 'debug' });
 *
 * log.info('Export started', { records: 42 });
 *
 * const end = log.time('serialize');
 * end({ bytes: 2048 }); // logs "serialize completed" with durationMs
 * ```
 */
export class Logger {
  private readonly config: Required<Omit<LoggerConfig, 'handler' | 'json'>> &
    Pick<LoggerConfig, 'handler' | 'json'>;
  private readonly listeners: Set<LogListener>;

  /** `listeners` is shared with children; leave it out for a new root */
  constructor(config: LoggerConfig = {}, listeners: Set<LogListener> = new Set()) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'quipkeep',
      handler: config.handler,
      json: config.json,
    };
    this.listeners = listeners;
  }

  /** Module name, including parent prefixes */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): Logger {
    return new Logger({ ...this.config, module: `${this.config.module}:${subModule}` }, this.listeners);
  }

  /**
   * Receive every entry of this logger, its parent and its children,
   * whatever their level. Returns a function that stops the listener.
   */
  observe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
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
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
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

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const enabled = LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.level];
    if (!enabled && this.listeners.size === 0) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    for (const listener of this.listeners) {
      listener(entry);
    }
    if (!enabled) return;

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json || this.config.debug) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

/** Factory function to create a Logger */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}
