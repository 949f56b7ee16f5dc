/**
 * Exclusion Engine — Caching Factory
 *
 * Memoizes anyOf / allOf results. The same exclusion pairs are combined
 * over and over while a dependency graph is walked, and the normalizing
 * rewrite is recursive, so repeated requests are answered from the cache.
 *
 * The key is the operation plus the ordered hash of every operand. Operand
 * order is part of the key: a list of three or more specs folded in a
 * different order can normalize to a different (equivalent) shape, and a
 * cache hit must return exactly what the delegate would have returned.
 *
 * The cache never changes a result, only whether it is recomputed.
 */

import { hashSpec } from '@exclusions/model';
import type { ExcludeFactory, ExcludeSpec } from '@exclusions/model';
import type { CombineOperation } from '../types/operation.js';
import { DelegatingExcludeFactory } from './delegating-factory.js';

export class CachingExcludeFactory extends DelegatingExcludeFactory {
  private readonly results = new Map<string, ExcludeSpec>();

  constructor(delegate: ExcludeFactory) {
    super(delegate);
  }

  override anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.cached('anyOf', specs, () => this.delegate.anyOf(specs));
  }

  override allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.cached('allOf', specs, () => this.delegate.allOf(specs));
  }

  /** Number of memoized results. */
  get size(): number {
    return this.results.size;
  }

  clear(): void {
    this.results.clear();
  }

  private cached(
    operation: CombineOperation,
    specs: ReadonlyArray<ExcludeSpec>,
    compute: () => ExcludeSpec,
  ): ExcludeSpec {
    const key = `${operation}(${specs.map((spec) => hashSpec(spec)).join(',')})`;
    const hit = this.results.get(key);
    if (hit !== undefined) {
      return hit;
    }
    const result = compute();
    this.results.set(key, result);
    return result;
  }
}
