/**
 * Exclusion Engine — Operation Log Types
 *
 * Every anyOf / allOf request that passes through a LoggingExcludeFactory
 * produces exactly one OperationLogEntry. Operands and result are recorded
 * in exclusion notation so an entry can be read, and re-run, without access
 * to the original objects.
 */

import type { ExcludeSpecHash } from '@exclusions/model';

/** The two combining operations a factory exposes. */
export type CombineOperation = 'anyOf' | 'allOf';

/**
 * A structured log entry for one combining request.
 *
 * All fields are required.
 */
export interface OperationLogEntry {
  /** ISO-8601 timestamp from the injected clock. */
  readonly timestamp: string;
  readonly operation: CombineOperation;
  /** Operands in request order, in exclusion notation. */
  readonly operands: ReadonlyArray<string>;
  /** The returned spec, in exclusion notation. */
  readonly result: string;
  readonly result_hash: ExcludeSpecHash;
}
