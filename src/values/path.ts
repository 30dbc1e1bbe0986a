/**
 * Attribute paths into typed value trees
 *
 * A path is an ordered list of steps from the root of a value: an attribute
 * name (object), an element key (map) or an element index (list/tuple).
 *
 * The canonical string form is the identity used for path lookups such as the
 * computed-field set. Attribute and key steps print the same way, so
 * `metadata.labels["app"]` and `metadata.labels.app` address the same node
 * whether `labels` is typed as an object or as a map.
 */

import { PathParseError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export type PathStep =
  | { readonly kind: 'attribute'; readonly name: string }
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'index'; readonly index: number };

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

// =============================================================================
// AttributePath
// =============================================================================

export class AttributePath {
  readonly steps: readonly PathStep[];

  constructor(steps: readonly PathStep[] = []) {
    this.steps = steps;
  }

  static root(): AttributePath {
    return ROOT;
  }

  static of(...names: string[]): AttributePath {
    return new AttributePath(names.map((name) => ({ kind: 'attribute', name })));
  }

  get length(): number {
    return this.steps.length;
  }

  isRoot(): boolean {
    return this.steps.length === 0;
  }

  withAttribute(name: string): AttributePath {
    return new AttributePath([...this.steps, { kind: 'attribute', name }]);
  }

  withKey(key: string): AttributePath {
    return new AttributePath([...this.steps, { kind: 'key', key }]);
  }

  withIndex(index: number): AttributePath {
    return new AttributePath([...this.steps, { kind: 'index', index }]);
  }

  /**
   * Path with the first `count` steps removed
   */
  slice(count: number): AttributePath {
    return new AttributePath(this.steps.slice(count));
  }

  /**
   * Same node under the canonical form: an attribute step equals a key step
   * with the same name
   */
  equals(other: AttributePath): boolean {
    return this.steps.length === other.steps.length && this.toString() === other.toString();
  }

  toString(): string {
    let out = '';
    for (const step of this.steps) {
      if (step.kind === 'index') {
        out += `[${step.index}]`;
        continue;
      }
      const name = step.kind === 'attribute' ? step.name : step.key;
      if (IDENTIFIER.test(name)) {
        out += out.length === 0 ? name : `.${name}`;
      } else {
        out += `[${JSON.stringify(name)}]`;
      }
    }
    return out;
  }
}

const ROOT = new AttributePath();

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a field path such as `spec.template.metadata.labels["app.io/name"]`
 * or `spec.ports[0].port`.
 *
 * The path must start with an attribute name. `.name` selects an attribute,
 * `["key"]` an element key (JSON string syntax) and `[0]` an element index.
 */
export function parseFieldPath(input: string): AttributePath {
  const steps: PathStep[] = [];
  let pos = 0;

  const readIdentifier = (): string => {
    const match = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(input.slice(pos));
    if (!match) {
      throw new PathParseError(input, pos, 'expected an attribute name');
    }
    pos += match[0].length;
    return match[0];
  };

  steps.push({ kind: 'attribute', name: readIdentifier() });

  while (pos < input.length) {
    const ch = input[pos];

    if (ch === '.') {
      pos++;
      steps.push({ kind: 'attribute', name: readIdentifier() });
      continue;
    }

    if (ch !== '[') {
      throw new PathParseError(input, pos, `unexpected character "${ch}"`);
    }

    pos++;
    if (input[pos] === '"') {
      steps.push({ kind: 'key', key: readQuoted(input, pos, (end) => (pos = end)) });
    } else {
      const match = /^\d+/.exec(input.slice(pos));
      if (!match) {
        throw new PathParseError(input, pos, 'expected a quoted key or a numeric index');
      }
      pos += match[0].length;
      steps.push({ kind: 'index', index: Number(match[0]) });
    }

    if (input[pos] !== ']') {
      throw new PathParseError(input, pos, 'expected "]"');
    }
    pos++;
  }

  return new AttributePath(steps);
}

function readQuoted(input: string, start: number, advance: (end: number) => void): string {
  let i = start + 1;
  while (i < input.length && input[i] !== '"') {
    i += input[i] === '\\' ? 2 : 1;
  }
  if (i >= input.length) {
    throw new PathParseError(input, start, 'unterminated string');
  }

  const literal = input.slice(start, i + 1);
  let key: unknown;
  try {
    key = JSON.parse(literal);
  } catch {
    throw new PathParseError(input, start, `invalid string literal ${literal}`);
  }
  if (typeof key !== 'string') {
    throw new PathParseError(input, start, `invalid string literal ${literal}`);
  }
  advance(i + 1);
  return key;
}
