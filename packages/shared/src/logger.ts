/**
 * Configurable Logger
 *
 * Simple logger that can be enabled/disabled via configuration.
 * Every package logs through this so the CLI can route or silence output.
 */

// ============================================
// Types
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogHandler = (
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
) => void;

export interface LoggerConfig {
  /** Enable/disable logging (default: true outside of tests) */
  enabled?: boolean;
  /** Minimum log level to output */
  level?: LogLevel;
  /** Prefix for console output */
  prefix?: string;
  /** Custom log handler (default: console) */
  handler?: LogHandler;
}

// ============================================
// Constants
// ============================================

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: Required<Omit<LoggerConfig, "handler">> = {
  enabled: process.env.NODE_ENV !== "test",
  level: "info",
  prefix: "faultline",
};

// ============================================
// Logger Class
// ============================================

/**
 * Configurable logger for analysis runs.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug" });
 * logger.info("[analyze] Collected signals", { errors: 12 });
 * ```
 */
export class Logger {
  private config: Required<Omit<LoggerConfig, "handler">> & {
    handler?: LogHandler;
  };

  constructor(config: LoggerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  /**
   * Derive a logger with a different prefix that shares level and handler.
   */
  child(prefix: string): Logger {
    return new Logger({ ...this.config, prefix });
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void {
    if (!this.config.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) return;

    if (this.config.handler) {
      this.config.handler(level, message, meta);
      return;
    }

    const line = `${new Date().toISOString()} [${this.config.prefix}] ${message}`;
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    switch (level) {
      case "debug":
        console.debug(`${line}${metaStr}`);
        break;
      case "info":
        console.log(`${line}${metaStr}`);
        break;
      case "warn":
        console.warn(`${line}${metaStr}`);
        break;
      case "error":
        console.error(`${line}${metaStr}`);
        break;
    }
  }
}

// ============================================
// Factory & Singleton
// ============================================

let defaultLogger: Logger | null = null;

/**
 * Create a new logger instance.
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Get or create the default logger instance.
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}

/**
 * Configure the default logger.
 */
export function configureLogger(config: LoggerConfig): Logger {
  defaultLogger = new Logger(config);
  return defaultLogger;
}
