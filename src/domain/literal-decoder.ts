import { ok, err, type Result } from 'neverthrow';

/**
 * Structured values carried as text in metadata table cells, e.g.
 * `['Sst-IRES-Cre']`, `[1, 2, 3]`, `{'depth': 175}`.
 *
 * The encoding is a small literal language: lists, tuples, dicts, quoted
 * strings, numbers, `True`, `False`, `None`. Tuples decode to arrays and
 * dict keys to strings; parentheses around a single value without a
 * trailing comma only group it.
 */
export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | readonly LiteralValue[]
  | { readonly [key: string]: LiteralValue };

export interface LiteralDecodeError {
  readonly message: string;
  readonly offset: number;
}

const KEYWORDS: Readonly<Record<string, LiteralValue>> = {
  True: true,
  False: false,
  None: null,
};

/** Deepest container nesting accepted before the cell is rejected. */
export const MAX_LITERAL_DEPTH = 100;

const NUMBER_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
};

class DecodeFailure extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
  }
}

class LiteralParser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly text: string) {}

  parseDocument(): LiteralValue {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      this.fail(`unexpected trailing input "${this.text.slice(this.pos, this.pos + 10)}"`);
    }
    return value;
  }

  private parseValue(): LiteralValue {
    this.skipWhitespace();
    const ch = this.text[this.pos];
    switch (ch) {
      case undefined:
        return this.fail('unexpected end of input');
      case '[':
        return this.nested(() => this.parseSequence('[', ']'));
      case '(':
        return this.nested(() => this.parseParenthesized());
      case '{':
        return this.nested(() => this.parseDict());
      case "'":
      case '"':
        return this.parseString(ch);
      default:
        return this.parseAtom();
    }
  }

  private nested<T>(parse: () => T): T {
    this.depth += 1;
    if (this.depth > MAX_LITERAL_DEPTH) this.fail(`nesting deeper than ${MAX_LITERAL_DEPTH}`);
    const value = parse();
    this.depth -= 1;
    return value;
  }

  /**
   * `()` and `(a,)` / `(a, b)` are tuples; `(a)` is just `a`.
   */
  private parseParenthesized(): LiteralValue {
    this.expect('(');
    this.skipWhitespace();
    if (this.peek() === ')') {
      this.pos += 1;
      return [];
    }
    const first = this.parseValue();
    this.skipWhitespace();
    if (this.peek() !== ',') {
      this.expect(')');
      return first;
    }
    this.pos += 1;
    const rest = this.parseSequenceTail(')');
    return [first, ...rest];
  }

  private parseSequence(open: string, close: string): LiteralValue[] {
    this.expect(open);
    return this.parseSequenceTail(close);
  }

  /** Items after an opening bracket (or a first item and its comma). */
  private parseSequenceTail(close: string): LiteralValue[] {
    const items: LiteralValue[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.peek() === close) {
        this.pos += 1;
        return items;
      }
      items.push(this.parseValue());
      this.skipWhitespace();
      if (this.peek() === ',') {
        this.pos += 1;
        continue;
      }
      this.expect(close);
      return items;
    }
  }

  private parseDict(): { [key: string]: LiteralValue } {
    this.expect('{');
    const out: { [key: string]: LiteralValue } = {};
    for (;;) {
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.pos += 1;
        return out;
      }
      const keyOffset = this.pos;
      const key = this.parseValue();
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new DecodeFailure('dict keys must be strings or numbers', keyOffset);
      }
      this.skipWhitespace();
      this.expect(':');
      out[String(key)] = this.parseValue();
      this.skipWhitespace();
      if (this.peek() === ',') {
        this.pos += 1;
        continue;
      }
      this.expect('}');
      return out;
    }
  }

  private parseString(quote: string): string {
    const start = this.pos;
    this.pos += 1;
    let out = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos] ?? '';
      if (ch === quote) {
        this.pos += 1;
        return out;
      }
      if (ch === '\\') {
        out += this.parseEscape();
        continue;
      }
      out += ch;
      this.pos += 1;
    }
    throw new DecodeFailure('unterminated string', start);
  }

  private parseEscape(): string {
    const escOffset = this.pos;
    const next = this.text[this.pos + 1];
    if (next === undefined) throw new DecodeFailure('dangling escape', escOffset);

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }

    const width = next === 'x' ? 2 : next === 'u' ? 4 : 0;
    if (width === 0) throw new DecodeFailure(`unsupported escape \\${next}`, escOffset);

    const hex = this.text.slice(this.pos + 2, this.pos + 2 + width);
    if (hex.length !== width || !/^[0-9a-fA-F]+$/.test(hex)) {
      throw new DecodeFailure(`bad \\${next} escape`, escOffset);
    }
    this.pos += 2 + width;
    return String.fromCharCode(parseInt(hex, 16));
  }

  private parseAtom(): LiteralValue {
    const rest = this.text.slice(this.pos);

    const word = /^[A-Za-z_]\w*/.exec(rest)?.[0];
    if (word !== undefined) {
      if (!(word in KEYWORDS)) this.fail(`unknown name "${word}"`);
      this.pos += word.length;
      return KEYWORDS[word] ?? null;
    }

    const num = NUMBER_PATTERN.exec(rest)?.[0];
    if (num !== undefined) {
      this.pos += num.length;
      return Number(num);
    }

    return this.fail(`unexpected character "${rest[0] ?? ''}"`);
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos] ?? '')) this.pos += 1;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      this.fail(`expected "${ch}"`);
    }
    this.pos += 1;
  }

  private fail(message: string): never {
    throw new DecodeFailure(message, this.pos);
  }
}

/**
 * Decode one literal-encoded cell.
 */
export function decodeLiteral(text: string): Result<LiteralValue, LiteralDecodeError> {
  try {
    return ok(new LiteralParser(text).parseDocument());
  } catch (e) {
    if (e instanceof DecodeFailure) {
      return err({ message: `${e.message} at offset ${e.offset}`, offset: e.offset });
    }
    throw e;
  }
}
