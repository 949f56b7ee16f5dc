/**
 * Exclusion Engine — Logging Factory
 *
 * Records one OperationLogEntry per anyOf / allOf request, after the
 * delegate has produced its result. Leaf and singleton construction is not
 * logged. A request whose delegate throws produces no entry; the error
 * propagates unchanged.
 */

import { formatExcludeSpec, hashSpec } from '@exclusions/model';
import type { ExcludeFactory, ExcludeSpec } from '@exclusions/model';
import type { OperationLogger } from '../logging/operation-log.js';
import type { CombineOperation } from '../types/operation.js';
import { DelegatingExcludeFactory } from './delegating-factory.js';

const systemClock = (): string => new Date().toISOString();

export class LoggingExcludeFactory extends DelegatingExcludeFactory {
  /**
   * @param clock - Timestamp source; injectable for deterministic tests
   */
  constructor(
    delegate: ExcludeFactory,
    private readonly logger: OperationLogger,
    private readonly clock: () => string = systemClock,
  ) {
    super(delegate);
  }

  override anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.logged('anyOf', specs, this.delegate.anyOf(specs));
  }

  override allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.logged('allOf', specs, this.delegate.allOf(specs));
  }

  private logged(
    operation: CombineOperation,
    specs: ReadonlyArray<ExcludeSpec>,
    result: ExcludeSpec,
  ): ExcludeSpec {
    this.logger.record({
      timestamp: this.clock(),
      operation,
      operands: specs.map((spec) => formatExcludeSpec(spec)),
      result: formatExcludeSpec(result),
      result_hash: hashSpec(result),
    });
    return result;
  }
}
