/**
 * Exclusion Model — Core Type Definitions
 *
 * Exclusion specs form a closed tagged union discriminated on `kind`.
 * No further variants exist: every dispatch over ExcludeSpec in this
 * repository is exhaustive over the five kinds below.
 *
 * Specs are immutable values. Combining two specs produces a new spec, or
 * returns one of the operands unchanged. Nothing mutates a spec after it
 * has been constructed.
 *
 * This package has no internal dependencies. The engine and the CLI both
 * depend on it.
 */

// ---------------------------------------------------------------------------
// Leaf coordinates
// ---------------------------------------------------------------------------

/**
 * The artifact part of a leaf exclusion.
 *
 * Compared by value: two artifact names are equal when both the name and
 * the extension are equal.
 */
export interface ArtifactName {
  readonly name: string;
  /**
   * File extension, e.g. `jar` or `aar`. An absent extension is its own
   * value: `a` and `a@jar` are different artifact names.
   */
  readonly extension?: string | undefined;
}

/**
 * The three coordinate fields of a leaf exclusion.
 *
 * An absent field is a wildcard: it matches any value for that coordinate.
 */
export interface LeafCoordinates {
  readonly group?: string | undefined;
  readonly module?: string | undefined;
  readonly artifact?: ArtifactName | undefined;
}

// ---------------------------------------------------------------------------
// Spec variants
// ---------------------------------------------------------------------------

/** Excludes every coordinate. Absorbing for union, identity for intersection. */
export interface ExcludeEverything {
  readonly kind: 'everything';
}

/** Excludes no coordinate. Identity for union, absorbing for intersection. */
export interface ExcludeNothing {
  readonly kind: 'nothing';
}

/** Excludes the coordinates matching its group, module and artifact fields. */
export interface ExcludeLeaf extends LeafCoordinates {
  readonly kind: 'leaf';
}

/**
 * Logical OR of its components.
 *
 * Components are uniqued by structural equality. Their order is the order
 * in which they were added and carries no meaning.
 */
export interface ExcludeAnyOf {
  readonly kind: 'anyOf';
  readonly components: ReadonlyArray<ExcludeSpec>;
}

/** Logical AND of its components. Components are uniqued. */
export interface ExcludeAllOf {
  readonly kind: 'allOf';
  readonly components: ReadonlyArray<ExcludeSpec>;
}

export type CompositeExclude = ExcludeAnyOf | ExcludeAllOf;

export type ExcludeSpec =
  | ExcludeEverything
  | ExcludeNothing
  | ExcludeLeaf
  | ExcludeAnyOf
  | ExcludeAllOf;

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Opaque brand symbol for ExcludeSpecHash.
 */
declare const __excludeSpecHashBrand: unique symbol;

/**
 * A branded string holding the SHA-256 hex digest of a spec's canonical form.
 *
 * Structurally equal specs always produce the same hash. Only hashSpec()
 * produces values of this type.
 */
export type ExcludeSpecHash = string & {
  readonly [__excludeSpecHashBrand]: 'ExcludeSpecHash';
};

// ---------------------------------------------------------------------------
// Notation parse results
// ---------------------------------------------------------------------------

/**
 * A syntax error in exclusion notation. `position` is the zero-based
 * character offset where the error was detected.
 */
export interface ParseError {
  readonly position: number;
  readonly message: string;
}

/**
 * Result of parsing exclusion notation.
 * Either the spec or a list of parse errors, never a partial spec.
 */
export type ParseResult =
  | { readonly ok: true; readonly spec: ExcludeSpec }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Thrown when a value outside the closed set of spec kinds reaches a
 * dispatch point.
 *
 * This is an internal invariant failure: either a new kind was added to
 * ExcludeSpec without updating every dispatch, or a caller built a spec
 * object by hand. It must never be caught and turned into a result, since
 * any fallback would silently change what gets excluded.
 */
export class UnsupportedSpecError extends Error {
  constructor(spec: unknown) {
    super(`Unexpected spec type: ${describeKind(spec)}`);
    this.name = 'UnsupportedSpecError';
  }
}

/**
 * Thrown by parseExcludeSpecOrThrow() when the notation is invalid.
 * Carries every error the parser reported.
 */
export class NotationError extends Error {
  constructor(
    public readonly source: string,
    public readonly errors: ReadonlyArray<ParseError>,
  ) {
    super(
      `Invalid exclusion notation ${JSON.stringify(source)}: ` +
        errors.map((e) => `${e.message} at ${e.position}`).join('; '),
    );
    this.name = 'NotationError';
  }
}

function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return value === null ? 'null' : typeof value;
}
