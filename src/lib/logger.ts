import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * Destination for log lines. Defaults to stderr so that rendered prompts on
 * stdout stay clean.
 */
export type LogSink = (line: string) => void;

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Narrow an arbitrary string to a log level
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  return LEVEL_NAMES.find((level) => level === value);
}

/**
 * Simple logger with colored output
 */
export class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private sink: LogSink = stderrSink;

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
    if (config.sink !== undefined) {
      this.sink = config.sink;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const text = this.prefix ? `${this.prefix} ${message}` : message;
    const extra = args.length > 0 ? ` ${args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ")}` : "";
    this.sink(this.colorize(level, text + extra));
  }

  private colorize(level: LogLevel, line: string): string {
    switch (level) {
      case "debug":
        return chalk.gray(line);
      case "warn":
        return chalk.yellow(line);
      case "error":
        return chalk.red(line);
      default:
        return line;
    }
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  /**
   * Info level logging (default color)
   */
  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.sink = this.sink;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
