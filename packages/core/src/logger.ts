/**
 * Structured Logger
 * JSON-formatted logging with levels, bound metadata and child loggers
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogOutput = 'stdout' | 'stderr' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'text';
  output?: LogOutput;
  serviceName?: string;
}

export interface LogMetadata {
  [key: string]: unknown;
}

/**
 * Parse a level name such as "debug" or "WARN".
 * Unknown names fall back to the given default.
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (name?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

export class Logger {
  private level: LogLevel;
  private format: 'json' | 'text';
  private output: LogOutput;
  private serviceName: string;
  private bound: LogMetadata;

  constructor(config: LoggerConfig = {}, bound: LogMetadata = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.format = config.format ?? 'json';
    this.output = config.output ?? 'stdout';
    this.serviceName = config.serviceName ?? 'lnurl-wallet';
    this.bound = bound;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.ERROR, message, metadata);
  }

  /**
   * Render a log line, or null when the level is filtered out.
   * Exposed for tests; callers use the level methods.
   */
  render(level: LogLevel, message: string, metadata?: LogMetadata): string | null {
    if (level < this.level) {
      return null;
    }

    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];
    const merged = { ...this.bound, ...metadata };

    if (this.format === 'json') {
      return JSON.stringify({
        timestamp,
        level: levelName,
        service: this.serviceName,
        message,
        ...merged,
      });
    }

    const metaStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    return `[${timestamp}] ${levelName} [${this.serviceName}] ${message}${metaStr}`;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    const line = this.render(level, message, metadata);
    if (line === null || this.output === 'silent') {
      return;
    }

    const stream = this.output === 'stderr' ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(metadata: LogMetadata): Logger {
    return new Logger(
      {
        level: this.level,
        format: this.format,
        output: this.output,
        serviceName: this.serviceName,
      },
      { ...this.bound, ...metadata }
    );
  }
}

/**
 * Error details suitable for log metadata.
 */
export function errorMeta(error: unknown): LogMetadata {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

// Default logger instance
export const logger = new Logger();
