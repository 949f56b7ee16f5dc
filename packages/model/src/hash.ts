/**
 * Exclusion Model — Structural Hashing
 *
 * hashSpec() is a pure deterministic function over a spec's structure:
 * SHA-256 over a canonical JSON form. It agrees with specEquals():
 * structurally equal specs always produce the same hash, including
 * composites whose components were added in a different order.
 *
 * Digests are memoized per spec object. Specs are immutable, so a memoized
 * digest never goes stale; the WeakMap lets unreachable specs be collected.
 */

import { createHash } from 'node:crypto';
import type { ExcludeSpec, ExcludeSpecHash } from './types.js';
import { UnsupportedSpecError } from './types.js';

// ---------------------------------------------------------------------------
// Internal: Canonical JSON serialization for deterministic hashing
// ---------------------------------------------------------------------------

/**
 * Produces a canonical JSON string with deterministic key ordering.
 *
 * Standard JSON.stringify follows property insertion order. This function
 * sorts object keys at every level so that identical structures produce
 * identical strings.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value !== 'object') {
    return JSON.stringify(String(value));
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
  return '{' + pairs.join(',') + '}';
}

/**
 * The value that gets canonicalized for a spec.
 *
 * Absent leaf fields become null so that `{ group: 'g' }` and
 * `{ group: 'g', module: undefined }` hash the same. Composite components are
 * reduced to their own hashes, sorted, so component order does not matter.
 * Duplicate hashes are kept, matching the multiset equality of specEquals().
 */
function canonicalForm(spec: ExcludeSpec): unknown {
  switch (spec.kind) {
    case 'everything':
    case 'nothing':
      return { kind: spec.kind };
    case 'leaf':
      return {
        kind: spec.kind,
        group: spec.group ?? null,
        module: spec.module ?? null,
        artifact:
          spec.artifact === undefined
            ? null
            : { name: spec.artifact.name, extension: spec.artifact.extension ?? null },
      };
    case 'anyOf':
    case 'allOf':
      return {
        kind: spec.kind,
        components: spec.components.map(hashSpec).sort(),
      };
    default:
      throw new UnsupportedSpecError(spec);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const digests = new WeakMap<ExcludeSpec, ExcludeSpecHash>();

/**
 * Compute the SHA-256 hash of a spec's canonical form.
 *
 * @returns ExcludeSpecHash — branded SHA-256 hex digest
 * @throws {UnsupportedSpecError} If the spec, or any component, is not a known kind
 */
export function hashSpec(spec: ExcludeSpec): ExcludeSpecHash {
  const memo = digests.get(spec);
  if (memo !== undefined) {
    return memo;
  }
  const hex = createHash('sha256').update(canonicalize(canonicalForm(spec))).digest('hex');
  const digest = hex as ExcludeSpecHash;
  digests.set(spec, digest);
  return digest;
}
