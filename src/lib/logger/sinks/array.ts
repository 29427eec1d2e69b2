import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink stores logs in memory for testing and debugging
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  /** Entries stored untransformed because the transformer threw */
  public transformerFailures = 0;
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    this.logs.push(this.transform(entry));
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Logs as `type: message` lines, handy for exact assertions
   */
  public getSimplifiedLogs(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  /**
   * Entries for one entity (component id), in write order
   */
  public forEntity(entityName: string): LogEntry[] {
    return this.logs.filter((log) => log.entityName === entityName);
  }

  /**
   * Close the sink and stop accepting new logs
   */
  public close(): void {
    this.closed = true;
  }

  private transform(entry: LogEntry): LogEntry {
    if (!this.transformer) {
      return entry;
    }

    try {
      const transformed = this.transformer(entry);
      return transformed === false ? entry : transformed;
    } catch {
      this.transformerFailures++;
      return entry;
    }
  }
}
