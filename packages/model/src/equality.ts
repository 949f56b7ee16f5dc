/**
 * Exclusion Model — Structural Equality
 *
 * Two specs are equal when they are the same kind with equal fields.
 * Composite components are compared as multisets: every component of one
 * is matched to a distinct equal component of the other. Insertion order
 * does not matter. Duplicates do: the raw factory may build them, and
 * `any(a, a)` must not equal `any(a, b)`. hashSpec() hashes the same
 * multiset, so the two always agree.
 *
 * Structural equality implies semantic equivalence. The engine relies on
 * this for its idempotence and absorption short-circuits.
 */

import type { ArtifactName, ExcludeSpec } from './types.js';
import { UnsupportedSpecError } from './types.js';

/**
 * Value equality of two optional artifact names. Both absent is equal.
 */
export function artifactNamesEqual(
  a: ArtifactName | undefined,
  b: ArtifactName | undefined,
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.name === b.name && a.extension === b.extension;
}

/**
 * Structural equality of two exclusion specs.
 *
 * @throws {UnsupportedSpecError} If `a` is not one of the known spec kinds
 */
export function specEquals(a: ExcludeSpec, b: ExcludeSpec): boolean {
  if (a === b) {
    return true;
  }
  switch (a.kind) {
    case 'everything':
    case 'nothing':
      return b.kind === a.kind;
    case 'leaf':
      return (
        b.kind === 'leaf' &&
        a.group === b.group &&
        a.module === b.module &&
        artifactNamesEqual(a.artifact, b.artifact)
      );
    case 'anyOf':
    case 'allOf':
      return b.kind === a.kind && componentsEqual(a.components, b.components);
    default:
      throw new UnsupportedSpecError(a);
  }
}

function componentsEqual(
  a: ReadonlyArray<ExcludeSpec>,
  b: ReadonlyArray<ExcludeSpec>,
): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const unmatched = [...b];
  return a.every((left) => {
    const index = unmatched.findIndex((right) => specEquals(left, right));
    if (index === -1) {
      return false;
    }
    unmatched.splice(index, 1);
    return true;
  });
}
