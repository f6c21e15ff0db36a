// ---------------------------------------------------------------------------
// JSON document tree
// ---------------------------------------------------------------------------

/**
 * JSON value that keeps what `JSON.parse` drops: object members stay in source
 * order (integer-like keys included) and numbers keep their exact digits.
 */
export type JsonNode =
  | { kind: 'object'; entries: Array<[string, JsonNode]> }
  | { kind: 'array'; items: JsonNode[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; raw: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

const WHITESPACE = /[ \t\n\r]*/y;
const STRING = /"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

class Reader {
  private pos = 0;

  constructor(private readonly text: string) {}

  document(): JsonNode {
    if (this.text.charCodeAt(0) === 0xfeff) this.pos = 1;
    const node = this.value();
    this.skipWhitespace();
    if (this.pos !== this.text.length) throw this.error('unexpected content after the document');
    return node;
  }

  private value(): JsonNode {
    this.skipWhitespace();
    switch (this.text[this.pos]) {
      case '{':
        return this.object();
      case '[':
        return this.array();
      case '"':
        return { kind: 'string', value: this.string() };
      case 't':
        this.literal('true');
        return { kind: 'boolean', value: true };
      case 'f':
        this.literal('false');
        return { kind: 'boolean', value: false };
      case 'n':
        this.literal('null');
        return { kind: 'null' };
      default:
        return { kind: 'number', raw: this.match(NUMBER, 'expected a value') };
    }
  }

  private object(): JsonNode {
    this.pos++;
    const entries: Array<[string, JsonNode]> = [];
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return { kind: 'object', entries };
    }
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] !== '"') throw this.error('expected a property name');
      const key = this.string();
      this.skipWhitespace();
      this.expect(':');
      entries.push([key, this.value()]);
      this.skipWhitespace();
      if (this.text[this.pos] !== ',') break;
      this.pos++;
    }
    this.expect('}');
    return { kind: 'object', entries };
  }

  private array(): JsonNode {
    this.pos++;
    const items: JsonNode[] = [];
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return { kind: 'array', items };
    }
    for (;;) {
      items.push(this.value());
      this.skipWhitespace();
      if (this.text[this.pos] !== ',') break;
      this.pos++;
    }
    this.expect(']');
    return { kind: 'array', items };
  }

  private string(): string {
    const raw = this.match(STRING, 'invalid string');
    // The token is already validated; JSON.parse only decodes its escapes.
    const decoded: unknown = JSON.parse(raw);
    if (typeof decoded !== 'string') throw this.error('invalid string');
    return decoded;
  }

  private literal(word: string): void {
    if (!this.text.startsWith(word, this.pos)) throw this.error(`expected ${word}`);
    this.pos += word.length;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) throw this.error(`expected '${ch}'`);
    this.pos++;
  }

  private match(pattern: RegExp, message: string): string {
    pattern.lastIndex = this.pos;
    const m = pattern.exec(this.text);
    if (!m || m[0] === '') throw this.error(message);
    this.pos += m[0].length;
    return m[0];
  }

  private skipWhitespace(): void {
    WHITESPACE.lastIndex = this.pos;
    const m = WHITESPACE.exec(this.text);
    if (m) this.pos += m[0].length;
  }

  private error(message: string): SyntaxError {
    return new SyntaxError(`${message} at position ${this.pos}`);
  }
}

/** Throws SyntaxError on anything `JSON.parse` would also reject. */
export function parseJsonDocument(text: string): JsonNode {
  return new Reader(text).document();
}

/** Last member named `key`, matching `JSON.parse` on duplicate keys. */
export function memberOf(node: JsonNode, key: string): JsonNode | undefined {
  if (node.kind !== 'object') return undefined;
  let found: JsonNode | undefined;
  for (const [name, value] of node.entries) {
    if (name === key) found = value;
  }
  return found;
}

/** Same layout as `JSON.stringify(value, null, 2)`. */
export function stringifyJsonDocument(node: JsonNode, depth = 0): string {
  const inner = '  '.repeat(depth + 1);
  const outer = '  '.repeat(depth);
  switch (node.kind) {
    case 'object':
      if (node.entries.length === 0) return '{}';
      return `{\n${node.entries
        .map(([key, value]) => `${inner}${JSON.stringify(key)}: ${stringifyJsonDocument(value, depth + 1)}`)
        .join(',\n')}\n${outer}}`;
    case 'array':
      if (node.items.length === 0) return '[]';
      return `[\n${node.items
        .map((item) => `${inner}${stringifyJsonDocument(item, depth + 1)}`)
        .join(',\n')}\n${outer}]`;
    case 'string':
      return JSON.stringify(node.value);
    case 'number':
      return node.raw;
    case 'boolean':
      return node.value ? 'true' : 'false';
    case 'null':
      return 'null';
  }
}
