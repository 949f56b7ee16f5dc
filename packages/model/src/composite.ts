/**
 * Exclusion Model — Composite Helpers
 *
 * Pure helpers over AnyOf / AllOf. Code that needs to tell a leaf or
 * singleton from a composite uses isComposite(), never the finer
 * anyOf / allOf distinction.
 */

import { specEquals } from './equality.js';
import type {
  CompositeExclude,
  ExcludeAllOf,
  ExcludeAnyOf,
  ExcludeSpec,
} from './types.js';

export function isComposite(spec: ExcludeSpec): spec is CompositeExclude {
  return spec.kind === 'anyOf' || spec.kind === 'allOf';
}

/**
 * True if the composite has a component structurally equal to `spec`.
 */
export function containsComponent(composite: CompositeExclude, spec: ExcludeSpec): boolean {
  return composite.components.some((component) => specEquals(component, spec));
}

/**
 * Append-with-dedup.
 *
 * Returns `composite` itself when it already has a component equal to
 * `spec`; otherwise a new composite of the same kind with `spec` appended.
 * The no-duplicate invariant holds for the result either way.
 */
export function addComponent(composite: ExcludeAnyOf, spec: ExcludeSpec): ExcludeAnyOf;
export function addComponent(composite: ExcludeAllOf, spec: ExcludeSpec): ExcludeAllOf;
export function addComponent(composite: CompositeExclude, spec: ExcludeSpec): CompositeExclude;
export function addComponent(composite: CompositeExclude, spec: ExcludeSpec): CompositeExclude {
  if (containsComponent(composite, spec)) {
    return composite;
  }
  const components = [...composite.components, spec];
  return composite.kind === 'anyOf'
    ? { kind: 'anyOf', components }
    : { kind: 'allOf', components };
}
