/**
 * Logging for the Thunderstore client.
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Options for {@link ConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Fields written with every line, such as the repository URL */
  context?: Record<string, unknown>;
}

/**
 * Logger writing one line per entry to the console.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ level: 'debug', context: { baseUrl: DEV_BASE_URL } });
 * logger.info('Downloading package', { version: 'Evaisa-LethalLib-0.16.0' });
 * // 2024-01-01T00:00:00.000Z [Thunderstore] [INFO] Downloading package
 * //   {"baseUrl":"https://thunderstore.dev","version":"Evaisa-LethalLib-0.16.0"}
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly context: Record<string, unknown>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '[Thunderstore]';
    this.context = options.context ?? {};
  }

  /**
   * Returns a logger at the same level whose lines also carry `context`.
   */
  child(context: Record<string, unknown>): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix: this.prefix,
      context: { ...this.context, ...context },
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    let log = `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
    const fields = { ...this.context, ...context };
    if (Object.keys(fields).length > 0) {
      log += ` ${JSON.stringify(fields)}`;
    }
    return log;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, context));
    }
  }
}

/**
 * No-op logger
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
