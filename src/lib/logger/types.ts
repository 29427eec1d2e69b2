/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important/higher priority
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS (routine operational info)
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

/**
 * Maps a LogType to its corresponding LogLevel
 */
export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

/**
 * Options for log methods
 */
export interface LogOptions {
  params?: Record<string, unknown>;
  tags?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'lifecycle-manager'
  entityName?: string; // e.g. a component id such as 'billing.invoices'
  template: string; // "Component {{id}} started"
  message: string; // "Component billing.invoices started"
  params?: Record<string, unknown>;
  error?: unknown; // Original error object from errorObject() calls
  tags?: string[];
}

/**
 * Sink interface - all sinks must implement this
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Array log transformer function type.
 * Receives a log entry and returns either a transformed entry or false to keep the original.
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export type SinkErrorHandler = (
  error: Error,
  context: 'write' | 'close',
  sink: LogSink,
) => void;

export interface LoggerOptions {
  sinks?: LogSink[];
  onSinkError?: SinkErrorHandler;
}
