/**
 * Exclusion Engine — Delegating Factory
 *
 * Base class for factory decorators. Forwards every operation to the
 * wrapped factory; subclasses override the operations they intercept.
 */

import type {
  ExcludeEverything,
  ExcludeFactory,
  ExcludeLeaf,
  ExcludeNothing,
  ExcludeSpec,
  LeafCoordinates,
} from '@exclusions/model';

export abstract class DelegatingExcludeFactory implements ExcludeFactory {
  protected constructor(protected readonly delegate: ExcludeFactory) {}

  nothing(): ExcludeNothing {
    return this.delegate.nothing();
  }

  everything(): ExcludeEverything {
    return this.delegate.everything();
  }

  leaf(coordinates: LeafCoordinates): ExcludeLeaf {
    return this.delegate.leaf(coordinates);
  }

  anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.delegate.anyOf(specs);
  }

  allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return this.delegate.allOf(specs);
  }
}
