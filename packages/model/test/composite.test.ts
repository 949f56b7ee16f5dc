/**
 * Exclusion Model — Composite Helper and Raw Factory Tests
 *
 * composite/classification: only anyOf and allOf are composite
 * composite/append: addComponent appends new components and dedups existing ones
 * raw-factory: builds exactly what it is given
 */

import { describe, it, expect } from 'vitest';
import {
  DefaultExcludeFactory,
  addComponent,
  containsComponent,
  isComposite,
} from '../src/index.js';
import type { ExcludeAllOf, ExcludeAnyOf } from '../src/index.js';

const raw = new DefaultExcludeFactory();

const A = raw.leaf({ group: 'a' });
const B = raw.leaf({ group: 'b' });
const C = raw.leaf({ group: 'c' });

const ANY_AB: ExcludeAnyOf = { kind: 'anyOf', components: [A, B] };
const ALL_AB: ExcludeAllOf = { kind: 'allOf', components: [A, B] };

describe('composite: classification', () => {
  it('classifies anyOf and allOf as composite', () => {
    expect(isComposite(ANY_AB)).toBe(true);
    expect(isComposite(ALL_AB)).toBe(true);
  });

  it('classifies leaves and singletons as non-composite', () => {
    expect(isComposite(A)).toBe(false);
    expect(isComposite(raw.everything())).toBe(false);
    expect(isComposite(raw.nothing())).toBe(false);
  });
});

describe('composite: append-with-dedup', () => {
  it('returns the same composite when an equal component exists', () => {
    expect(addComponent(ANY_AB, raw.leaf({ group: 'a' }))).toBe(ANY_AB);
  });

  it('appends a new component and keeps the kind', () => {
    const result = addComponent(ALL_AB, C);
    expect(result.kind).toBe('allOf');
    expect(result.components).toEqual([A, B, C]);
  });

  it('leaves the original composite untouched', () => {
    addComponent(ANY_AB, C);
    expect(ANY_AB.components).toEqual([A, B]);
  });

  it('containsComponent uses structural equality', () => {
    expect(containsComponent(ANY_AB, raw.leaf({ group: 'b' }))).toBe(true);
    expect(containsComponent(ANY_AB, C)).toBe(false);
  });
});

describe('raw-factory: no simplification', () => {
  it('returns shared singletons', () => {
    expect(raw.everything()).toBe(new DefaultExcludeFactory().everything());
    expect(raw.nothing()).toBe(new DefaultExcludeFactory().nothing());
  });

  it('keeps duplicates and degenerate lists as given', () => {
    expect(raw.anyOf([A, A])).toEqual({ kind: 'anyOf', components: [A, A] });
    expect(raw.allOf([])).toEqual({ kind: 'allOf', components: [] });
  });

  it('copies the component list', () => {
    const specs = [A, B];
    const composite = raw.anyOf(specs);
    specs.push(C);
    expect(composite).toEqual({ kind: 'anyOf', components: [A, B] });
  });
});
