import chalk from 'chalk';

/**
 * Verbosity levels for logging:
 * 0 = ESSENTIAL: Only critical information (errors, warnings, reload summaries)
 * 1 = NORMAL: Basic debug information (DEFAULT with --verbose flag)
 * 2 = VERBOSE: Detailed debug information (configuration, dependency edges)
 * 3 = TRACE: Extremely detailed information (path conversion, every watcher event)
 */
export enum LogLevel {
  ESSENTIAL = 0,
  NORMAL = 1,
  VERBOSE = 2,
  TRACE = 3,
}

interface LoggerOptions {
  /** The verbosity level (0-3) */
  level: LogLevel;
  /** Project root path for path normalization */
  projectRoot?: string;
  /** Whether to use relative paths in logs */
  useRelativePaths?: boolean;
  /** Whether to colorize log output */
  useColors?: boolean;
}

type Colorizer = (text: string) => string;

const PREFIX_COLORS: Record<string, Colorizer> = {
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.gray,
  VERBOSE: chalk.gray,
  TRACE: chalk.dim,
};

/**
 * Debug logger shared by the watcher, the analyzer and the dispatcher
 */
class DebugLogger {
  private options: LoggerOptions;

  /**
   * Create a new debug logger
   */
  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: options.level ?? LogLevel.ESSENTIAL,
      projectRoot: options.projectRoot,
      useRelativePaths: options.useRelativePaths ?? true,
      useColors: options.useColors ?? true,
    };
  }

  /**
   * Update logger options
   */
  setOptions(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  /**
   * Set the verbosity level. A boolean maps the --verbose flag onto NORMAL.
   */
  setLevel(level: LogLevel | boolean): void {
    if (typeof level === 'boolean') {
      this.options.level = level ? LogLevel.NORMAL : LogLevel.ESSENTIAL;
    } else {
      this.options.level = level;
    }
  }

  /**
   * Get the current verbosity level
   */
  getLevel(): LogLevel {
    return this.options.level;
  }

  /**
   * Set the project root for path normalization
   */
  setProjectRoot(projectRoot: string): void {
    this.options.projectRoot = projectRoot;
  }

  /**
   * Log a message at ESSENTIAL level (always shown)
   */
  info(message: string, ...args: unknown[]): void {
    this._log('INFO', LogLevel.ESSENTIAL, message, ...args);
  }

  /**
   * Log a warning message (always shown)
   */
  warn(message: string, ...args: unknown[]): void {
    this._log('WARN', LogLevel.ESSENTIAL, message, ...args);
  }

  /**
   * Log an error message (always shown)
   */
  error(message: string, ...args: unknown[]): void {
    this._log('ERROR', LogLevel.ESSENTIAL, message, ...args);
  }

  /**
   * Log a message at NORMAL level
   * Only shown when verbose flag is enabled
   */
  debug(message: string, ...args: unknown[]): void {
    this._log('DEBUG', LogLevel.NORMAL, message, ...args);
  }

  /**
   * Log a message at VERBOSE level
   * Requires verbosity level of 2 or higher
   */
  verbose(message: string, ...args: unknown[]): void {
    this._log('VERBOSE', LogLevel.VERBOSE, message, ...args);
  }

  /**
   * Log a message at TRACE level
   * Requires verbosity level of 3
   */
  trace(message: string, ...args: unknown[]): void {
    this._log('TRACE', LogLevel.TRACE, message, ...args);
  }

  /**
   * Normalize paths in log messages if needed
   */
  private normalizePath(input: string): string {
    if (!this.options.useRelativePaths || !this.options.projectRoot) {
      return input;
    }
    return input.split(this.options.projectRoot).join('.');
  }

  private formatArg(arg: unknown): string {
    if (typeof arg === 'string') {
      return this.normalizePath(arg);
    }
    if (arg instanceof Error) {
      return arg.message;
    }
    if (arg instanceof Set) {
      return this.formatArg([...arg]);
    }
    if (typeof arg === 'object' && arg !== null) {
      try {
        return this.normalizePath(JSON.stringify(arg));
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  }

  /**
   * Internal logging implementation
   */
  private _log(prefix: string, level: LogLevel, message: string, ...args: unknown[]): void {
    if (this.options.level < level) {
      return;
    }

    let formatted = this.normalizePath(message);
    if (args.length > 0) {
      formatted = `${formatted} ${args.map((a) => this.formatArg(a)).join(' ')}`;
    }

    const color = PREFIX_COLORS[prefix];
    const label = this.options.useColors && color ? color(prefix) : prefix;
    console.log(`${label} - ${formatted}`);
  }
}

// Create a default instance for convenient import
export const logger = new DebugLogger();
