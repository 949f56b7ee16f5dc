/**
 * Exclusion Model — Text Notation
 *
 * A compact text form for exclusion specs, used by the CLI and by tests to
 * write rules without building objects by hand. It is a tooling aid, not a
 * persistence format.
 *
 * Grammar:
 *
 *   spec      := 'everything' | 'nothing'
 *              | ('any' | 'all') '(' spec (',' spec)* ')'
 *              | leaf
 *   leaf      := field [':' field [':' artifact]]
 *   field     := '*' | IDENT
 *   artifact  := '*' | IDENT ['@' IDENT]
 *
 * Leaf fields are group, module and artifact, in that order. `*` or an
 * omitted field is a wildcard. Whitespace is allowed around composite
 * punctuation but not inside a leaf.
 *
 * @example
 * parseExcludeSpec('org.foo:*')                         // group org.foo, any module
 * parseExcludeSpec('org.foo:bar:bar-tests@jar')         // one artifact of one module
 * parseExcludeSpec('all(org.foo:*, *:bar)')             // both must match
 */

import { DefaultExcludeFactory } from './factory.js';
import type { ExcludeFactory } from './factory.js';
import type {
  ArtifactName,
  ExcludeLeaf,
  ExcludeSpec,
  ParseError,
  ParseResult,
} from './types.js';
import { NotationError, UnsupportedSpecError } from './types.js';

const IDENT_CHAR = /[A-Za-z0-9_.+-]/;
const SPACE_CHAR = /\s/;

/** Internal: unwinds the reader to parseExcludeSpec() on the first syntax error. */
class SyntaxFailure extends Error {
  constructor(public readonly error: ParseError) {
    super(error.message);
    this.name = 'SyntaxFailure';
  }
}

class NotationReader {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly factory: ExcludeFactory,
  ) {}

  readDocument(): ExcludeSpec {
    const spec = this.readSpec();
    this.skipSpace();
    const rest = this.peek();
    if (rest !== undefined) {
      throw this.fail(`Unexpected ${JSON.stringify(rest)}`);
    }
    return spec;
  }

  private readSpec(): ExcludeSpec {
    this.skipSpace();
    const start = this.pos;
    const word = this.readIdent();
    this.skipSpace();

    if ((word === 'any' || word === 'all') && this.peek() === '(') {
      this.pos++;
      const components = this.readList();
      return word === 'any' ? this.factory.anyOf(components) : this.factory.allOf(components);
    }
    // A keyword followed by ':' is a group that happens to share its name.
    if (word === 'everything' && this.peek() !== ':') {
      return this.factory.everything();
    }
    if (word === 'nothing' && this.peek() !== ':') {
      return this.factory.nothing();
    }

    this.pos = start;
    return this.readLeaf();
  }

  private readList(): ExcludeSpec[] {
    const specs = [this.readSpec()];
    this.skipSpace();
    while (this.peek() === ',') {
      this.pos++;
      specs.push(this.readSpec());
      this.skipSpace();
    }
    if (this.peek() !== ')') {
      throw this.fail("Expected ',' or ')'");
    }
    this.pos++;
    return specs;
  }

  private readLeaf(): ExcludeLeaf {
    const group = this.readField('group');
    let module: string | undefined;
    let artifact: ArtifactName | undefined;
    if (this.peek() === ':') {
      this.pos++;
      module = this.readField('module');
      if (this.peek() === ':') {
        this.pos++;
        artifact = this.readArtifact();
      }
    }
    return this.factory.leaf({ group, module, artifact });
  }

  private readField(label: string): string | undefined {
    if (this.peek() === '*') {
      this.pos++;
      return undefined;
    }
    const value = this.readIdent();
    if (value === '') {
      throw this.fail(`Expected ${label} name or '*'`);
    }
    return value;
  }

  private readArtifact(): ArtifactName | undefined {
    if (this.peek() === '*') {
      this.pos++;
      return undefined;
    }
    const name = this.readIdent();
    if (name === '') {
      throw this.fail("Expected artifact name or '*'");
    }
    if (this.peek() !== '@') {
      return { name };
    }
    this.pos++;
    const extension = this.readIdent();
    if (extension === '') {
      throw this.fail('Expected artifact extension');
    }
    return { name, extension };
  }

  private readIdent(): string {
    const start = this.pos;
    while (this.pos < this.source.length && IDENT_CHAR.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private skipSpace(): void {
    while (this.pos < this.source.length && SPACE_CHAR.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private fail(message: string): SyntaxFailure {
    return new SyntaxFailure({ position: this.pos, message });
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse exclusion notation into a spec.
 *
 * Composites are built with `factory`: the default raw factory keeps the
 * shape of the input, a normalizing factory simplifies while reading.
 * Parse failures are never partial.
 */
export function parseExcludeSpec(
  source: string,
  factory: ExcludeFactory = new DefaultExcludeFactory(),
): ParseResult {
  try {
    return { ok: true, spec: new NotationReader(source, factory).readDocument() };
  } catch (err) {
    if (err instanceof SyntaxFailure) {
      return { ok: false, errors: [err.error] };
    }
    throw err;
  }
}

/**
 * Parse exclusion notation, throwing on invalid input.
 *
 * @throws {NotationError} If the notation cannot be parsed
 */
export function parseExcludeSpecOrThrow(
  source: string,
  factory: ExcludeFactory = new DefaultExcludeFactory(),
): ExcludeSpec {
  const parsed = parseExcludeSpec(source, factory);
  if (!parsed.ok) {
    throw new NotationError(source, parsed.errors);
  }
  return parsed.spec;
}

/**
 * Render a spec in exclusion notation.
 *
 * Composite components are written in their stored order. The output parses
 * back to an equal spec, except for empty composites, which the grammar
 * cannot express.
 */
export function formatExcludeSpec(spec: ExcludeSpec): string {
  switch (spec.kind) {
    case 'everything':
    case 'nothing':
      return spec.kind;
    case 'leaf':
      return formatLeaf(spec);
    case 'anyOf':
      return `any(${spec.components.map(formatExcludeSpec).join(', ')})`;
    case 'allOf':
      return `all(${spec.components.map(formatExcludeSpec).join(', ')})`;
    default:
      throw new UnsupportedSpecError(spec);
  }
}

function formatLeaf(leaf: ExcludeLeaf): string {
  const coordinates = `${leaf.group ?? '*'}:${leaf.module ?? '*'}`;
  if (leaf.artifact === undefined) {
    return coordinates;
  }
  const { name, extension } = leaf.artifact;
  return `${coordinates}:${extension === undefined ? name : `${name}@${extension}`}`;
}
