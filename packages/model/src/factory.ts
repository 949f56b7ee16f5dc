/**
 * Exclusion Model — Factory Interface and Raw Factory
 *
 * ExcludeFactory is the seam the dependency-graph walk talks to. The raw
 * DefaultExcludeFactory builds exactly what it is asked for: anyOf() and
 * allOf() wrap their arguments without simplification. The normalizing
 * engine (@exclusions/engine) extends it and only falls back to these raw
 * constructors once no rewrite law applies.
 */

import type {
  ExcludeEverything,
  ExcludeLeaf,
  ExcludeNothing,
  ExcludeSpec,
  LeafCoordinates,
} from './types.js';

export interface ExcludeFactory {
  nothing(): ExcludeNothing;
  everything(): ExcludeEverything;
  leaf(coordinates: LeafCoordinates): ExcludeLeaf;
  /** Excluded if any of `specs` would exclude. */
  anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec;
  /** Excluded if every one of `specs` would exclude. */
  allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec;
}

const EVERYTHING: ExcludeEverything = { kind: 'everything' };
const NOTHING: ExcludeNothing = { kind: 'nothing' };

/**
 * Non-simplifying factory.
 *
 * everything() and nothing() return shared singletons. anyOf() and allOf()
 * construct a composite from whatever is passed, in order, including
 * duplicates and degenerate zero- or one-component lists.
 */
export class DefaultExcludeFactory implements ExcludeFactory {
  nothing(): ExcludeNothing {
    return NOTHING;
  }

  everything(): ExcludeEverything {
    return EVERYTHING;
  }

  leaf(coordinates: LeafCoordinates): ExcludeLeaf {
    return {
      kind: 'leaf',
      group: coordinates.group,
      module: coordinates.module,
      artifact: coordinates.artifact,
    };
  }

  anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return { kind: 'anyOf', components: [...specs] };
  }

  allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    return { kind: 'allOf', components: [...specs] };
  }
}
