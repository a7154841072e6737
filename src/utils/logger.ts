/**
 * symdoc - Centralized Logging
 * @module utils/logger
 *
 * Single logging interface for the builder, the extraction workers and the
 * lookup service. Library modules never write to the console directly.
 */

import { appendFileSync } from 'node:fs';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface LoggerOptions {
  /** Minimum level to output */
  level?: LogLevel;
  /** Output format: 'pretty' for terminals, 'json' for piped output */
  format?: 'pretty' | 'json';
  /** Enable colored output (pretty format only) */
  colors?: boolean;
  /** Append plain-text lines to this file instead of the terminal */
  file?: string;
  /** Custom output function (for testing) */
  output?: (entry: LogEntry) => void;
}

export interface ScopedLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// =============================================================================
// Log Level Priorities
// =============================================================================

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelPriority;
}

// =============================================================================
// ANSI Colors
// =============================================================================

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const indicators: Record<LogLevel, { symbol: string; color: keyof typeof colors }> = {
  debug: { symbol: '●', color: 'gray' },
  info: { symbol: '●', color: 'blue' },
  warn: { symbol: '▲', color: 'yellow' },
  error: { symbol: '✗', color: 'red' },
};

// =============================================================================
// Logger Class
// =============================================================================

export class Logger implements ScopedLogger {
  private level: LogLevel;
  private format: 'pretty' | 'json';
  private useColors: boolean;
  private file?: string;
  private customOutput?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || this.getDefaultLevel();
    this.format = options.format || this.getDefaultFormat();
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.file = options.file;
    this.customOutput = options.output;
  }

  /**
   * Default level from LOG_LEVEL, falling back to info in production
   */
  private getDefaultLevel(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      return envLevel;
    }
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
  }

  private getDefaultFormat(): 'pretty' | 'json' {
    if (process.env.LOG_FORMAT === 'json') {
      return 'json';
    }
    return process.stdout.isTTY ? 'pretty' : 'json';
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private formatContext(context: LogContext): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      const formatted = typeof value === 'string' ? value : JSON.stringify(value);
      parts.push(`${key}=${formatted}`);
    }
    return parts.join(' ');
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const hasContext = context !== undefined && Object.keys(context).length > 0;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(hasContext ? { context } : {}),
    };

    if (this.customOutput) {
      this.customOutput(entry);
      return;
    }

    const contextStr = hasContext ? ` ${this.formatContext(context)}` : '';

    // Log files get the same line shape whatever the terminal format is
    if (this.file) {
      appendFileSync(this.file, `${level.toUpperCase()} - ${message}${contextStr}\n`);
      return;
    }

    const stream = level === 'error' ? process.stderr : process.stdout;

    if (this.format === 'json') {
      stream.write(JSON.stringify(entry) + '\n');
      return;
    }

    const { symbol, color } = indicators[level];
    const timestamp = this.colorize(new Date().toLocaleTimeString(), 'dim');
    const coloredContext = hasContext ? ` ${this.colorize(this.formatContext(context), 'gray')}` : '';
    stream.write(`${this.colorize(symbol, color)} ${timestamp} ${message}${coloredContext}\n`);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Create a child logger that adds `baseContext` to every entry
   */
  child(baseContext: LogContext): ScopedLogger {
    return {
      debug: (msg, ctx) => this.debug(msg, { ...baseContext, ...ctx }),
      info: (msg, ctx) => this.info(msg, { ...baseContext, ...ctx }),
      warn: (msg, ctx) => this.warn(msg, { ...baseContext, ...ctx }),
      error: (msg, ctx) => this.error(msg, { ...baseContext, ...ctx }),
    };
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
    if (options.colors !== undefined) this.useColors = options.colors;
    if (options.file) this.file = options.file;
    if (options.output) this.customOutput = options.output;
  }
}

// =============================================================================
// Singleton Export
// =============================================================================

/**
 * Global logger instance
 *
 * ```typescript
 * import { logger } from './utils/logger.js';
 *
 * logger.info('parsing docset', { path });
 * logger.debug('skipped file', { file, reason });
 * ```
 */
export const logger = new Logger();

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
