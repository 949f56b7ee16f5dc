/**
 * Exclusion Engine — Operation Logger
 *
 * The sink is optional: without one, record() is a no-op. This keeps the
 * logging decorator usable in-process (tests, embedded use) without
 * deciding where entries go.
 */

import type { OperationLogEntry } from '../types/operation.js';
import type { LogSink } from './log-sink.js';

export class OperationLogger {
  constructor(private readonly sink?: LogSink) {}

  /**
   * Record one operation log entry. Forwarded to the sink when one was
   * injected.
   */
  record(entry: OperationLogEntry): void {
    this.sink?.append(entry);
  }
}
