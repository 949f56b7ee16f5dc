/**
 * Exclusion Engine — Log Sink Interface
 *
 * The engine owns this contract and the OperationLogger class. Concrete
 * sinks are injected at construction time: MemoryLogSink here, and the
 * console sink in @exclusions/cli. The normalizing factory itself never
 * logs and never performs I/O.
 */

import type { OperationLogEntry } from '../types/operation.js';

/**
 * A sink that receives operation log entries.
 *
 * append() is called synchronously, after the operation has produced its
 * result and before that result is returned to the caller.
 */
export interface LogSink {
  append(entry: OperationLogEntry): void;
}

/**
 * Keeps every appended entry in memory, in append order.
 * Suitable for tests and for embedding callers that inspect the log.
 */
export class MemoryLogSink implements LogSink {
  private readonly entries: OperationLogEntry[] = [];

  append(entry: OperationLogEntry): void {
    this.entries.push(entry);
  }

  list(): ReadonlyArray<OperationLogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
