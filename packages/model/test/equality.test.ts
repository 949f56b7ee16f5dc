/**
 * Exclusion Model — Structural Equality and Hashing Tests
 *
 * equality/leaf: leaves are equal when every coordinate field is equal
 * equality/composite: composites compare components as multisets
 * equality/unsupported: unknown kinds fail loudly
 * hash/agreement: equal specs hash equal, different specs hash differently
 *
 * Tests are pure: no I/O, no state.
 */

import { describe, it, expect } from 'vitest';
import {
  DefaultExcludeFactory,
  UnsupportedSpecError,
  artifactNamesEqual,
  hashSpec,
  specEquals,
} from '../src/index.js';
import type { ExcludeSpec } from '../src/index.js';

const raw = new DefaultExcludeFactory();

const FOO = raw.leaf({ group: 'org.foo' });
const FOO_BAR = raw.leaf({ group: 'org.foo', module: 'bar' });
const BAZ = raw.leaf({ group: 'org.baz' });

// ---------------------------------------------------------------------------
// equality/leaf
// ---------------------------------------------------------------------------

describe('equality: leaves', () => {
  it('treats separately built leaves with the same fields as equal', () => {
    expect(specEquals(FOO_BAR, raw.leaf({ group: 'org.foo', module: 'bar' }))).toBe(true);
  });

  it('distinguishes a wildcard module from a concrete one', () => {
    expect(specEquals(FOO, FOO_BAR)).toBe(false);
  });

  it('compares artifacts by name and extension', () => {
    const jar = raw.leaf({ group: 'g', artifact: { name: 'a', extension: 'jar' } });
    const aar = raw.leaf({ group: 'g', artifact: { name: 'a', extension: 'aar' } });
    const sameJar = raw.leaf({ group: 'g', artifact: { name: 'a', extension: 'jar' } });
    expect(specEquals(jar, sameJar)).toBe(true);
    expect(specEquals(jar, aar)).toBe(false);
  });

  it('artifactNamesEqual treats two absent names as equal and one absent as different', () => {
    expect(artifactNamesEqual(undefined, undefined)).toBe(true);
    expect(artifactNamesEqual({ name: 'a' }, undefined)).toBe(false);
    expect(artifactNamesEqual({ name: 'a' }, { name: 'a' })).toBe(true);
    expect(artifactNamesEqual({ name: 'a' }, { name: 'a', extension: 'jar' })).toBe(false);
  });

  it('never equates a leaf with a singleton', () => {
    expect(specEquals(raw.leaf({}), raw.everything())).toBe(false);
    expect(specEquals(raw.nothing(), raw.everything())).toBe(false);
    expect(specEquals(raw.nothing(), raw.nothing())).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// equality/composite
// ---------------------------------------------------------------------------

describe('equality: composites', () => {
  it('ignores component order', () => {
    expect(specEquals(raw.anyOf([FOO, BAZ]), raw.anyOf([BAZ, FOO]))).toBe(true);
  });

  it('distinguishes anyOf from allOf over the same components', () => {
    expect(specEquals(raw.anyOf([FOO, BAZ]), raw.allOf([FOO, BAZ]))).toBe(false);
  });

  it('distinguishes composites of different size', () => {
    expect(specEquals(raw.anyOf([FOO, BAZ]), raw.anyOf([FOO, BAZ, FOO_BAR]))).toBe(false);
  });

  it('counts duplicate components, in both directions', () => {
    const doubled = raw.anyOf([FOO, FOO]);
    const pair = raw.anyOf([FOO, BAZ]);
    expect(specEquals(doubled, pair)).toBe(false);
    expect(specEquals(pair, doubled)).toBe(false);
    expect(specEquals(raw.allOf([FOO, FOO, BAZ]), raw.allOf([FOO, BAZ, BAZ]))).toBe(false);
    expect(specEquals(raw.allOf([FOO, BAZ, FOO]), raw.allOf([BAZ, FOO, FOO]))).toBe(true);
  });

  it('compares nested composites structurally', () => {
    const a = raw.allOf([raw.anyOf([FOO, BAZ]), FOO_BAR]);
    const b = raw.allOf([FOO_BAR, raw.anyOf([BAZ, FOO])]);
    expect(specEquals(a, b)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// equality/unsupported
// ---------------------------------------------------------------------------

describe('equality: unsupported kinds', () => {
  it('throws UnsupportedSpecError naming the unknown kind', () => {
    const bogus = { kind: 'bogus' } as unknown as ExcludeSpec;
    expect(() => specEquals(bogus, FOO)).toThrow(UnsupportedSpecError);
    expect(() => specEquals(bogus, FOO)).toThrow('Unexpected spec type: bogus');
  });
});

// ---------------------------------------------------------------------------
// hash/agreement
// ---------------------------------------------------------------------------

describe('hash: agreement with structural equality', () => {
  it('produces a 64-char hex digest', () => {
    expect(hashSpec(FOO)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('hashes equal leaves identically', () => {
    expect(hashSpec(FOO_BAR)).toBe(hashSpec(raw.leaf({ group: 'org.foo', module: 'bar' })));
  });

  it('treats an explicitly undefined field like an absent one', () => {
    expect(hashSpec({ kind: 'leaf', group: 'org.foo' })).toBe(
      hashSpec({ kind: 'leaf', group: 'org.foo', module: undefined, artifact: undefined }),
    );
  });

  it('hashes composites independently of component order', () => {
    expect(hashSpec(raw.anyOf([FOO, BAZ]))).toBe(hashSpec(raw.anyOf([BAZ, FOO])));
  });

  it('agrees with equality when composites hold duplicates', () => {
    expect(hashSpec(raw.anyOf([FOO, FOO]))).not.toBe(hashSpec(raw.anyOf([FOO, BAZ])));
    expect(hashSpec(raw.anyOf([FOO, FOO]))).not.toBe(hashSpec(raw.anyOf([FOO])));
    expect(hashSpec(raw.allOf([FOO, BAZ, FOO]))).toBe(hashSpec(raw.allOf([BAZ, FOO, FOO])));
  });

  it('hashes different specs differently', () => {
    expect(hashSpec(FOO)).not.toBe(hashSpec(FOO_BAR));
    expect(hashSpec(raw.anyOf([FOO, BAZ]))).not.toBe(hashSpec(raw.allOf([FOO, BAZ])));
    expect(hashSpec(raw.everything())).not.toBe(hashSpec(raw.nothing()));
  });

  it('does not confuse a module name with an artifact name', () => {
    const byModule = raw.leaf({ group: 'g', module: 'x' });
    const byArtifact = raw.leaf({ group: 'g', artifact: { name: 'x' } });
    expect(hashSpec(byModule)).not.toBe(hashSpec(byArtifact));
  });
});
