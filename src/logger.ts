/** Structured logger: one JSON line per event, filtered by environment. */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Environment = 'test' | 'development' | 'production';

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  event_type: string;
  metadata: LogMetadata;
  timestamp: string;
}

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: LogMetadata): Logger;
  debug(event_type: string, metadata?: LogMetadata): void;
  info(event_type: string, metadata?: LogMetadata): void;
  warn(event_type: string, metadata?: LogMetadata): void;
  error(event_type: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level. */
  minLevel?: LogLevel;
  /** Receives each serialized entry. Defaults to console.log. */
  write?: (line: string) => void;
}

/** Minimum level per environment */
const ENVIRONMENT_LEVELS: Record<Environment, LogLevel> = {
  test: 'debug',
  development: 'info',
  production: 'warn',
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

class LoggerImpl implements Logger {
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;

  constructor(
    private readonly config: LoggerConfig,
    private readonly metadata: LogMetadata = {},
  ) {
    this.minLevel = config.minLevel ?? ENVIRONMENT_LEVELS[config.environment ?? 'development'];
    this.write = config.write ?? (line => console.log(line));
  }

  child(metadata: LogMetadata): Logger {
    return new LoggerImpl(this.config, { ...this.metadata, ...metadata });
  }

  debug(event_type: string, metadata?: LogMetadata): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: LogMetadata): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: LogMetadata): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: LogMetadata): void {
    this.log('error', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      level,
      event_type,
      metadata: { ...this.metadata, ...metadata },
      timestamp: new Date().toISOString(),
    };
    this.write(JSON.stringify(entry));
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}

const SILENT: Logger = {
  child: () => SILENT,
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
  return SILENT;
}
