/**
 * @exclusions/engine
 *
 * Normalizing exclusion engine. Combines exclusion specs with union and
 * intersection while applying identity, absorption, idempotence,
 * subsumption and distribution laws, so results stay small and canonical.
 *
 * The normalizing factory is pure. Caching and logging are opt-in
 * decorators assembled by createExcludeFactory().
 */

// Types
export type { CombineOperation, OperationLogEntry } from './types/operation.js';
export type { EngineOptions } from './configuration/options.js';

// Log sink interface and in-memory implementation
export type { LogSink } from './logging/log-sink.js';
export { MemoryLogSink } from './logging/log-sink.js';
export { OperationLogger } from './logging/operation-log.js';

// Factories
export { NormalizingExcludeFactory } from './normalizing/normalizing-factory.js';
export { DelegatingExcludeFactory } from './factories/delegating-factory.js';
export { CachingExcludeFactory } from './factories/caching-factory.js';
export { LoggingExcludeFactory } from './factories/logging-factory.js';
export { createExcludeFactory } from './configuration/options.js';
