import { ms } from '../unix-time-helpers';
import { isPromise } from '../type-guards';
import { toError } from '../error-to-string';
import type {
  LogEntry,
  LogSink,
  LogType,
  LoggerOptions,
  LogOptions,
  ArrayLogTransformer,
  SinkErrorHandler,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { renderTemplate } from './utils/template';
import { prepareErrorObjectLog } from './utils/error-object';
import { LoggerService } from './logger-service';

/**
 * Sink-based logger. Every entry is templated once and handed to each sink;
 * a failing sink never affects the caller or the other sinks.
 */
export class Logger {
  private sinks: LogSink[];
  private onSinkError?: SinkErrorHandler;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    this.sinks = options.sinks ? [...options.sinks] : [];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, { ...(options ?? {}), error });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Remove a sink from the logger
   * Returns true if the sink was found and removed, false otherwise
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);
    if (index !== -1) {
      this.sinks.splice(index, 1);
      return true;
    }
    return false;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks. Entries logged afterwards are dropped.
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(toError(error), 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];
  }

  /**
   * Create a logger optimized for testing.
   * Includes an ArraySink by default for easy log inspection.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    arrayLogTransformer?: ArrayLogTransformer;
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink({
      transformer: options?.arrayLogTransformer,
    });

    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const params = options?.params;
    const tags = options?.tags;

    const entry: LogEntry = {
      timestamp: ms(),
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message: params ? renderTemplate(template, params) : template,
      params,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.then(undefined, (error: unknown) => {
            this.handleSinkError(toError(error), 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(toError(error), 'write', sink);
      }
    }
  }

  /**
   * Handle sink errors by calling the onSinkError callback or falling back to console.error
   */
  private handleSinkError(
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
      } catch {
        // eslint-disable-next-line no-console
        console.error(`Error in onSinkError handler: ${error.message}`);
      }
    } else {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
      );
    }
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
