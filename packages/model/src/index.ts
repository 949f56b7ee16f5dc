/**
 * @exclusions/model
 *
 * Exclusion spec data model. This package defines:
 * - The closed ExcludeSpec union and its leaf coordinates
 * - Structural equality and structural hashing
 * - Pure composite helpers (append-with-dedup)
 * - The ExcludeFactory interface and the raw, non-simplifying factory
 * - A text notation for tooling and tests
 *
 * This package has no internal dependencies.
 */

// Types
export type {
  ArtifactName,
  CompositeExclude,
  ExcludeAllOf,
  ExcludeAnyOf,
  ExcludeEverything,
  ExcludeLeaf,
  ExcludeNothing,
  ExcludeSpec,
  ExcludeSpecHash,
  LeafCoordinates,
  ParseError,
  ParseResult,
} from './types.js';

export { NotationError, UnsupportedSpecError } from './types.js';

// Functions
export { artifactNamesEqual, specEquals } from './equality.js';
export { addComponent, containsComponent, isComposite } from './composite.js';
export { hashSpec } from './hash.js';
export { formatExcludeSpec, parseExcludeSpec, parseExcludeSpecOrThrow } from './notation.js';

// Factories
export type { ExcludeFactory } from './factory.js';
export { DefaultExcludeFactory } from './factory.js';
