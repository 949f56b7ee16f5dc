/**
 * Exclusion Engine — Factory Configuration
 *
 * createExcludeFactory() assembles the factory stack a resolution run uses:
 *
 *   LoggingExcludeFactory     (only when a sink is given)
 *     CachingExcludeFactory   (unless cache is false)
 *       NormalizingExcludeFactory
 *
 * Logging sits outermost so that cache hits are logged like any other
 * request.
 */

import type { ExcludeFactory } from '@exclusions/model';
import { CachingExcludeFactory } from '../factories/caching-factory.js';
import { LoggingExcludeFactory } from '../factories/logging-factory.js';
import type { LogSink } from '../logging/log-sink.js';
import { OperationLogger } from '../logging/operation-log.js';
import { NormalizingExcludeFactory } from '../normalizing/normalizing-factory.js';

export interface EngineOptions {
  /** Memoize anyOf / allOf results. Defaults to true. */
  readonly cache?: boolean | undefined;
  /** Receives one entry per anyOf / allOf request. No logging when absent. */
  readonly sink?: LogSink | undefined;
  /** Timestamp source for log entries. Defaults to the system clock. */
  readonly clock?: (() => string) | undefined;
}

const DEFAULT_ENGINE_OPTIONS = {
  cache: true,
} as const;

export function createExcludeFactory(options: EngineOptions = {}): ExcludeFactory {
  let factory: ExcludeFactory = new NormalizingExcludeFactory();
  if (options.cache ?? DEFAULT_ENGINE_OPTIONS.cache) {
    factory = new CachingExcludeFactory(factory);
  }
  if (options.sink !== undefined) {
    factory = new LoggingExcludeFactory(factory, new OperationLogger(options.sink), options.clock);
  }
  return factory;
}
