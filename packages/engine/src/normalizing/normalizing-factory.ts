/**
 * Exclusion Engine — Normalizing Factory
 *
 * Intercepts every union / intersection request and applies local rewrite
 * laws before anything is built:
 *
 *   identity       nothing ∪ X = X                everything ∩ X = X
 *   absorbing      everything ∪ X = everything    nothing ∩ X = nothing
 *   idempotence    X ∪ X = X                      X ∩ X = X
 *   subsumption    g:* ∪ g:m = g:*
 *   unification    g:* ∩ g:m = g:m                g1:* ∩ g2:* = nothing
 *   absorption     A ∪ (A ∩ B) = A
 *   distribution   X ∪ (A ∩ B) = (X ∪ A) ∩ (X ∪ B)
 *                  X ∩ (A ∪ B) = (X ∩ A) ∪ (X ∩ B)
 *
 * Distributed results re-enter anyOf() / allOf(), so whatever collapses
 * after distribution collapses immediately. The raw constructors inherited
 * from DefaultExcludeFactory are the fallback once no law applies, and are
 * only ever called with two operands.
 *
 * Binary union and intersection are commutative up to structural equality:
 * operands are put in a fixed order before dispatch.
 *
 * The factory holds no state. Every call is a pure, synchronous function of
 * its arguments and terminates: each recursive call either reduces an
 * operand or reaches a leaf / leaf pair or an append.
 */

import {
  DefaultExcludeFactory,
  UnsupportedSpecError,
  addComponent,
  artifactNamesEqual,
  containsComponent,
  hashSpec,
  isComposite,
  specEquals,
} from '@exclusions/model';
import type {
  CompositeExclude,
  ExcludeAllOf,
  ExcludeAnyOf,
  ExcludeLeaf,
  ExcludeSpec,
} from '@exclusions/model';

/** A spec that is neither everything nor nothing. */
type ConcreteSpec = ExcludeLeaf | CompositeExclude;

/** Result of unifying one leaf field during intersection. */
type Unified<T> =
  | { readonly compatible: true; readonly value: T | undefined }
  | { readonly compatible: false };

const INCOMPATIBLE = { compatible: false } as const;

export class NormalizingExcludeFactory extends DefaultExcludeFactory {
  /**
   * Simplified union of `specs`.
   *
   * An empty list excludes nothing. Otherwise the list is folded left to
   * right through union(), seeded with its first element.
   */
  override anyOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return this.nothing();
    }
    return rest.reduce<ExcludeSpec>((acc, spec) => this.union(acc, spec), first);
  }

  /**
   * Simplified intersection of `specs`.
   *
   * An empty list also excludes nothing, not everything. Callers depend on
   * this convention; do not change it to the intersection identity.
   */
  override allOf(specs: ReadonlyArray<ExcludeSpec>): ExcludeSpec {
    const [first, ...rest] = specs;
    if (first === undefined) {
      return this.nothing();
    }
    return rest.reduce<ExcludeSpec>((acc, spec) => this.intersection(acc, spec), first);
  }

  // -------------------------------------------------------------------------
  // Union
  // -------------------------------------------------------------------------

  private union(left: ExcludeSpec, right: ExcludeSpec): ExcludeSpec {
    if (specEquals(left, right)) {
      return left;
    }
    const [first, second] = orderOperands(left, right);
    return this.unionOrdered(first, second);
  }

  private unionOrdered(left: ExcludeSpec, right: ExcludeSpec): ExcludeSpec {
    if (left.kind === 'everything') {
      return left;
    }
    if (right.kind === 'everything') {
      return right;
    }
    if (left.kind === 'nothing') {
      return right;
    }
    if (right.kind === 'nothing') {
      return left;
    }
    switch (left.kind) {
      case 'leaf':
        return this.unionWithLeaf(left, right);
      case 'allOf':
        return this.unionWithAllOf(left, right);
      case 'anyOf':
        return addComponent(left, right);
      default:
        throw unexpectedSpec(left);
    }
  }

  private unionWithLeaf(left: ExcludeLeaf, right: ConcreteSpec): ExcludeSpec {
    switch (right.kind) {
      case 'leaf':
        return this.unionOfLeaves(left, right);
      case 'anyOf':
        return addComponent(right, left);
      case 'allOf':
        return this.unionWithAllOf(right, left);
      default:
        throw unexpectedSpec(right);
    }
  }

  private unionOfLeaves(left: ExcludeLeaf, right: ExcludeLeaf): ExcludeSpec {
    if (subsumes(left, right)) {
      return left;
    }
    if (subsumes(right, left)) {
      return right;
    }
    return super.anyOf([left, right]);
  }

  private unionWithAllOf(left: ExcludeAllOf, right: ExcludeSpec): ExcludeSpec {
    // A ∪ (A ∩ B) = A
    if (containsComponent(left, right)) {
      return right;
    }
    return this.allOf(left.components.map((component) => this.union(component, right)));
  }

  // -------------------------------------------------------------------------
  // Intersection
  // -------------------------------------------------------------------------

  private intersection(left: ExcludeSpec, right: ExcludeSpec): ExcludeSpec {
    if (specEquals(left, right)) {
      return left;
    }
    const [first, second] = orderOperands(left, right);
    return this.intersectionOrdered(first, second);
  }

  private intersectionOrdered(left: ExcludeSpec, right: ExcludeSpec): ExcludeSpec {
    if (left.kind === 'everything') {
      return right;
    }
    if (right.kind === 'everything') {
      return left;
    }
    if (left.kind === 'nothing') {
      return left;
    }
    if (right.kind === 'nothing') {
      return right;
    }
    switch (left.kind) {
      case 'leaf':
        return this.intersectionWithLeaf(left, right);
      case 'allOf':
        return addComponent(left, right);
      case 'anyOf':
        return this.intersectionWithAnyOf(left, right);
      default:
        throw unexpectedSpec(left);
    }
  }

  private intersectionWithLeaf(left: ExcludeLeaf, right: ConcreteSpec): ExcludeSpec {
    switch (right.kind) {
      case 'leaf':
        return this.intersectionOfLeaves(left, right);
      case 'allOf':
        return addComponent(right, left);
      case 'anyOf':
        return this.intersectionWithAnyOf(right, left);
      default:
        throw unexpectedSpec(right);
    }
  }

  private intersectionOfLeaves(left: ExcludeLeaf, right: ExcludeLeaf): ExcludeSpec {
    const group = unify(left.group, right.group, sameValue);
    const module = unify(left.module, right.module, sameValue);
    const artifact = unify(left.artifact, right.artifact, artifactNamesEqual);
    // No coordinate has two different values for the same field.
    if (!group.compatible || !module.compatible || !artifact.compatible) {
      return this.nothing();
    }
    return this.leaf({ group: group.value, module: module.value, artifact: artifact.value });
  }

  private intersectionWithAnyOf(left: ExcludeAnyOf, right: ExcludeSpec): ExcludeSpec {
    return this.anyOf(left.components.map((component) => this.intersection(component, right)));
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Operand order for dispatch. A composite goes right, so the checks are
 * driven by the operand more likely to be a leaf or singleton. Two
 * composites are ordered by hash, so union(A, B) and union(B, A) take the
 * same path and build the same spec.
 *
 * @internal
 */
function orderOperands(left: ExcludeSpec, right: ExcludeSpec): [ExcludeSpec, ExcludeSpec] {
  if (!isComposite(left)) {
    return [left, right];
  }
  if (!isComposite(right)) {
    return [right, left];
  }
  return hashSpec(left) <= hashSpec(right) ? [left, right] : [right, left];
}

/**
 * True if `general` matches everything `specific` matches: both name the
 * same group, `general` leaves module and artifact open, and `specific`
 * narrows at least one of them.
 *
 * @internal
 */
function subsumes(general: ExcludeLeaf, specific: ExcludeLeaf): boolean {
  return (
    general.group !== undefined &&
    general.group === specific.group &&
    general.module === undefined &&
    general.artifact === undefined &&
    (specific.module !== undefined || specific.artifact !== undefined)
  );
}

/**
 * Unify one leaf field. A wildcard takes the other side's value; two
 * concrete values must be equal.
 *
 * @internal
 */
function unify<T>(
  a: T | undefined,
  b: T | undefined,
  equals: (x: T, y: T) => boolean,
): Unified<T> {
  if (a !== undefined && b !== undefined) {
    return equals(a, b) ? { compatible: true, value: a } : INCOMPATIBLE;
  }
  return { compatible: true, value: a ?? b };
}

function sameValue(a: string, b: string): boolean {
  return a === b;
}

/**
 * Every dispatch above is exhaustive, so `spec` is `never` at compile time.
 * A spec built outside the known kinds still fails loudly at run time.
 *
 * @internal
 */
function unexpectedSpec(spec: never): UnsupportedSpecError {
  return new UnsupportedSpecError(spec);
}
