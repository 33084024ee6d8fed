/**
 * Observability Primitives
 *
 * Structured logging for the engine and evaluation packages.
 *
 * Hard rules:
 * - All logs are JSON structured
 * - Correlation via runId when the caller provides one
 * - Minimal overhead for disabled levels
 *
 * @module @flowkit/core/reliability/observability
 */

// =============================================================================
// Log Types
// =============================================================================

/**
 * Log levels
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Structured log entry
 */
export interface LogEntry {
  /** Log level */
  level: LogLevel;

  /** Log message */
  message: string;

  /** ISO timestamp */
  timestamp: string;

  /** Run ID for correlation */
  runId?: string;

  /** Unit or module name */
  component?: string;

  /** Additional structured data */
  data?: Record<string, unknown>;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Resolve the minimum level from the environment.
 * FLOWKIT_DEBUG=true wins over FLOWKIT_LOG_LEVEL.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.FLOWKIT_DEBUG === 'true') {
    return 'DEBUG';
  }
  switch (env.FLOWKIT_LOG_LEVEL?.toLowerCase()) {
    case 'debug':
      return 'DEBUG';
    case 'warn':
      return 'WARN';
    case 'error':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

// =============================================================================
// Logger
// =============================================================================

/**
 * Structured JSON logger
 */
export class Logger {
  private readonly component: string;
  private readonly context: Record<string, unknown>;
  private readonly minLevel?: LogLevel;

  constructor(component: string, context?: Record<string, unknown>, minLevel?: LogLevel) {
    this.component = component;
    this.context = context ?? {};
    this.minLevel = minLevel;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.component,
      { ...this.context, ...additionalContext },
      this.minLevel
    );
  }

  /**
   * Whether entries at this level are written
   */
  isEnabled(level: LogLevel): boolean {
    const min = this.minLevel ?? resolveLogLevel();
    return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    let errorData: LogEntry['error'];
    if (error instanceof Error) {
      const code: unknown = Reflect.get(error, 'code');
      errorData = {
        name: error.name,
        message: error.message,
        code: typeof code === 'string' ? code : undefined,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      errorData = { name: 'Error', message: String(error) };
    }

    this.log('ERROR', message, data, errorData);
  }

  /**
   * Log with timing
   */
  timed<T>(
    level: LogLevel,
    message: string,
    fn: () => T | Promise<T>,
    data?: Record<string, unknown>
  ): T | Promise<T> {
    const start = Date.now();
    const result = fn();

    if (result instanceof Promise) {
      return result.finally(() => {
        const durationMs = Date.now() - start;
        this.log(level, message, { ...data, durationMs });
      });
    }

    const durationMs = Date.now() - start;
    this.log(level, message, { ...data, durationMs });
    return result;
  }

  /**
   * Core log method
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const merged = { ...this.context, ...data };
    const runId = merged.runId;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      runId: typeof runId === 'string' ? runId : undefined,
      data: Object.keys(merged).length > 0 ? merged : undefined,
      error,
    };

    // Clean up undefined fields
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([, v]) => v !== undefined)
    );

    const output = JSON.stringify(cleaned);

    switch (level) {
      case 'DEBUG':
        console.debug(output);
        break;
      case 'INFO':
        console.info(output);
        break;
      case 'WARN':
        console.warn(output);
        break;
      case 'ERROR':
        console.error(output);
        break;
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

const loggers = new Map<string, Logger>();

/**
 * Get or create a logger for a component
 */
export function getLogger(component: string, context?: Record<string, unknown>): Logger {
  const key = context ? `${component}:${JSON.stringify(context)}` : component;

  let logger = loggers.get(key);
  if (!logger) {
    logger = new Logger(component, context);
    loggers.set(key, logger);
  }

  return logger;
}
