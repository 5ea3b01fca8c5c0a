import { JsonValue } from '../codecs/types.js';
import { ConfigError } from '../errors.js';

export type PathSelector =
  | { kind: 'name'; name: string }
  | { kind: 'index'; index: number }
  | { kind: 'wildcard' };

export interface PathSegment {
  /** `..` segments apply their selectors to the node and all of its descendants. */
  descendant: boolean;
  selectors: PathSelector[];
}

export interface JsonPath {
  readonly segments: readonly PathSegment[];
  readonly original: string;
}

const NAME_STOP = new Set(['.', '[']);
const NAME_FORBIDDEN = /[\]'"*\s]/;

class PathParser {
  private pos = 0;

  constructor(private readonly expr: string) {}

  parse(): JsonPath {
    if (this.expr[0] !== '$') {
      throw this.fail("must start with '$'");
    }
    this.pos = 1;

    const segments: PathSegment[] = [];
    while (this.pos < this.expr.length) {
      segments.push(this.segment());
    }
    return Object.freeze({ segments: Object.freeze(segments), original: this.expr });
  }

  private segment(): PathSegment {
    if (this.expr.startsWith('..', this.pos)) {
      this.pos += 2;
      if (this.peek() === '[') {
        return { descendant: true, selectors: this.bracket() };
      }
      return { descendant: true, selectors: [this.dotSelector()] };
    }
    if (this.peek() === '.') {
      this.pos++;
      return { descendant: false, selectors: [this.dotSelector()] };
    }
    if (this.peek() === '[') {
      return { descendant: false, selectors: this.bracket() };
    }
    throw this.fail(`unexpected '${this.peek()}'`);
  }

  private dotSelector(): PathSelector {
    if (this.peek() === '*') {
      this.pos++;
      return { kind: 'wildcard' };
    }
    const start = this.pos;
    while (this.pos < this.expr.length && !NAME_STOP.has(this.expr[this.pos])) {
      this.pos++;
    }
    const name = this.expr.slice(start, this.pos);
    if (!name) {
      throw this.fail('expected a member name');
    }
    if (NAME_FORBIDDEN.test(name)) {
      throw this.fail(`invalid member name '${name}'`);
    }
    return { kind: 'name', name };
  }

  private bracket(): PathSelector[] {
    this.pos++; // [
    const selectors: PathSelector[] = [];

    for (;;) {
      this.skipSpaces();
      selectors.push(this.bracketSelector());
      this.skipSpaces();

      const ch = this.peek();
      this.pos++;
      if (ch === ']') return selectors;
      if (ch !== ',') {
        throw this.fail(ch === undefined ? "missing ']'" : `unexpected '${ch}' in brackets`);
      }
    }
  }

  private bracketSelector(): PathSelector {
    const ch = this.peek();
    if (ch === '*') {
      this.pos++;
      return { kind: 'wildcard' };
    }
    if (ch === "'" || ch === '"') {
      return { kind: 'name', name: this.quoted(ch) };
    }

    const match = /^-?\d+/.exec(this.expr.slice(this.pos));
    if (!match) {
      throw this.fail(ch === undefined ? "missing ']'" : `unsupported selector at '${ch}'`);
    }
    this.pos += match[0].length;
    return { kind: 'index', index: Number(match[0]) };
  }

  private quoted(quote: string): string {
    this.pos++;
    let out = '';
    while (this.pos < this.expr.length) {
      const ch = this.expr[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\\' && this.pos + 1 < this.expr.length) {
        out += this.expr[this.pos + 1];
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
    throw this.fail('unterminated quoted name');
  }

  private skipSpaces(): void {
    while (this.peek() === ' ') this.pos++;
  }

  private peek(): string | undefined {
    return this.expr[this.pos];
  }

  private fail(reason: string): ConfigError {
    return new ConfigError(
      'InvalidPathExpression',
      `Path '${this.expr}' is invalid at position ${this.pos}: ${reason}`
    );
  }
}

/**
 * Compiles a JSONPath expression. Supported: `$`, `.name`, `..name`, `.*`,
 * `[n]` (negative from the end), `['name']`, `[*]` and unions like
 * `['a','b']` or `[0,2]`. Filters and slices are rejected.
 */
export function compileJsonPath(expr: string): JsonPath {
  return new PathParser(expr).parse();
}

function select(node: JsonValue, selector: PathSelector, out: JsonValue[]): void {
  switch (selector.kind) {
    case 'name':
      if (node instanceof Map) {
        const child = node.get(selector.name);
        if (child !== undefined) out.push(child);
      }
      return;
    case 'index':
      if (Array.isArray(node)) {
        const i = selector.index < 0 ? node.length + selector.index : selector.index;
        if (i >= 0 && i < node.length) out.push(node[i]);
      }
      return;
    case 'wildcard':
      if (Array.isArray(node)) {
        for (const child of node) out.push(child);
      } else if (node instanceof Map) {
        for (const child of node.values()) out.push(child);
      }
      return;
  }
}

/** Pre-order walk with an explicit stack; documents can nest arbitrarily deep. */
function descendantsOrSelf(root: JsonValue, out: JsonValue[]): void {
  const stack: JsonValue[] = [root];
  let node = stack.pop();

  while (node !== undefined) {
    out.push(node);
    const children = Array.isArray(node) ? node : node instanceof Map ? Array.from(node.values()) : [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
    node = stack.pop();
  }
}

/** Every node the path selects, in document order. */
export function queryJsonPath(path: JsonPath, document: JsonValue): JsonValue[] {
  let nodes: JsonValue[] = [document];

  for (const segment of path.segments) {
    const next: JsonValue[] = [];
    for (const node of nodes) {
      const targets: JsonValue[] = [];
      if (segment.descendant) descendantsOrSelf(node, targets);
      else targets.push(node);

      for (const target of targets) {
        for (const selector of segment.selectors) {
          select(target, selector, next);
        }
      }
    }
    nodes = next;
  }

  return nodes;
}
