// Centralized logging for the result package

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Destination for formatted lines. Defaults to the console method of the same level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[result]',
  timestamps: false
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_NAMES[name];
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton in place so every module holding `logger` sees the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.getInstance().config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && this.config.level <= level;
  }

  format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`, message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, 'ERROR', message, context);
  }

  /**
   * Log an error with its name and stack
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, 'ERROR', error.message, {
      ...context,
      name: error.name,
      stack: error.stack
    });
  }

  private write(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const sink = this.config.sink ?? consoleSink;
    sink(level, this.format(label, message, context));
  }
}

export const logger = Logger.getInstance();
