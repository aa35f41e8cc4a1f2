/**
 * Structured Logger utility class
 *
 * Provides static logging methods with consistent formatting, emoji prefixes,
 * and level filtering driven by the `LOG_LEVEL` environment variable.
 *
 * @example
 * ```typescript
 * Logger.info('Optimization loop started', { strategy: 'adaptive', interval_ms: 100 });
 * Logger.warn('Metric source unavailable', { source: 'random' });
 * Logger.error('execute optimization action', new Error('store offline'), { kind: 'boost_coherence' });
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Logging seam injected into the optimizer components.
 * Any structured logger with these four methods satisfies it.
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(operation: string, error: unknown, context?: LogContext): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class Logger {
  /**
   * Resolves the active level from `LOG_LEVEL`, defaulting to `info`
   */
  static currentLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase().trim();
    return isLogLevel(raw) ? raw : 'info';
  }

  static isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.currentLevel()];
  }

  /**
   * Logs error messages with structured formatting
   *
   * @param operation - Description of the operation that failed
   * @param error - The error object or message that occurred
   * @param context - Optional additional context information
   *
   * @example
   * ```typescript
   * try {
   *   await collector.collect();
   * } catch (error) {
   *   Logger.error('collect metrics', error, { tick: 42 });
   * }
   * ```
   */
  static error(operation: string, error: unknown, context?: LogContext): void {
    if (!Logger.isEnabled('error')) return;

    const errorInfo = Logger.extractErrorInfo(error);

    console.error(`❌ Failed to ${operation}:`, {
      message: errorInfo.message,
      stack: errorInfo.stack,
      ...(context && { context })
    });
  }

  /**
   * Logs informational messages
   *
   * @param message - The informational message to log
   * @param context - Optional additional context information
   */
  static info(message: string, context?: LogContext): void {
    if (!Logger.isEnabled('info')) return;

    console.log(`ℹ️ ${message}`, context ? { message, context } : '');
  }

  /**
   * Logs warning messages
   *
   * @param message - The warning message to log
   * @param context - Optional additional context information
   */
  static warn(message: string, context?: LogContext): void {
    if (!Logger.isEnabled('warn')) return;

    console.warn(`⚠️ ${message}`, context ? { message, context } : '');
  }

  /**
   * Logs per-tick detail that is too noisy for the default level
   */
  static debug(message: string, context?: LogContext): void {
    if (!Logger.isEnabled('debug')) return;

    console.debug(`🔍 ${message}`, context ? { message, context } : '');
  }

  /**
   * Extracts error information from various error types
   *
   * @private
   * @param error - The error to extract information from
   * @returns Structured error information with message and stack
   */
  private static extractErrorInfo(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
      return {
        message: error.message,
        stack: error.stack
      };
    }

    if (typeof error === 'string') {
      return { message: error };
    }

    if (error && typeof error === 'object') {
      // Handle error-like objects
      const message = 'message' in error && typeof error.message === 'string'
        ? error.message
        : JSON.stringify(error);
      const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
      return { message, stack };
    }

    // Fallback for unknown error types
    return {
      message: `Unknown error: ${String(error)}`
    };
  }
}

/**
 * Console-backed logger that routes through the static {@link Logger}
 */
export const consoleLogger: StructuredLogger = {
  debug: (message, context) => Logger.debug(message, context),
  info: (message, context) => Logger.info(message, context),
  warn: (message, context) => Logger.warn(message, context),
  error: (operation, error, context) => Logger.error(operation, error, context)
};

export const silentLogger: StructuredLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
