import { config, type LogLevelName } from "../config";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

const LOG_LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "",
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.SILENT]: "",
};

const RESET_COLOR = "\x1b[0m";

/**
 * Options for a {@link Logger}. Omitted values fall back to `config.logging`.
 */
export interface LoggerOptions {
  level?: LogLevelName;
  colorize?: boolean;
}

/**
 * Console logger tagged with a context name.
 *
 * @example
 * ```typescript
 * const logger = createLogger("stub");
 * logger.debug("Request matched a local rule", { method: "GET" });
 * // 2024-05-01T10:00:00.000Z DEBUG [stub] Request matched a local rule {"method":"GET"}
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly colorize: boolean;

  constructor(
    private readonly context: string,
    options: LoggerOptions = {}
  ) {
    const {
      level = config.logging.level,
      colorize = config.logging.colorize,
    } = options;
    this.level = LEVEL_BY_NAME[level];
    this.colorize = colorize;
  }

  public isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  public debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  public info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  public warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  public error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const label = LOG_LEVEL_LABELS[level].padEnd(5);
    const prefix = this.colorize
      ? `${LOG_LEVEL_COLORS[level]}${timestamp} ${label}${RESET_COLOR}`
      : `${timestamp} ${label}`;

    let line = `${prefix} [${this.context}] ${message}`;
    if (meta !== undefined) {
      line += ` ${JSON.stringify(meta)}`;
    }

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }
}

export function createLogger(context: string, options?: LoggerOptions): Logger {
  return new Logger(context, options);
}
