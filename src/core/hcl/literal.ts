/**
 * Literal values in HCL expression text: reading them into AttributeValue
 * and rendering AttributeValue back to source.
 */
import type { AttributeValue, ObjectValue } from '../model/attribute-value.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const NUMBER = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;
const INDENT = '  ';
const FOR_EXPRESSION = /^for\s/;

/**
 * Read an expression as a literal value. Anything that is not entirely a
 * literal (references, templates, calls, operators) becomes an expression.
 * Inside list and object literals only the offending item or field value
 * becomes an expression, so `[var.a, "b"]` is still a list.
 */
export function parseValue(expression: string): AttributeValue {
  const reader = new LiteralReader(expression);
  const value = reader.readValue();
  if (value === undefined || !reader.atEnd()) {
    return { kind: 'expression', text: expression.trim() };
  }
  return value;
}

class LiteralReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    this.skipTrivia();
    return this.pos >= this.text.length;
  }

  readValue(): AttributeValue | undefined {
    this.skipTrivia();
    const ch = this.text[this.pos];
    if (ch === undefined) return undefined;
    if (ch === '"') return this.readString();
    if (ch === '[') return this.readList();
    if (ch === '{') return this.readObject();
    if (ch === '-' || (ch >= '0' && ch <= '9')) return this.readNumber();
    const word = this.readWord();
    switch (word) {
      case 'true':
        return { kind: 'bool', value: true };
      case 'false':
        return { kind: 'bool', value: false };
      case 'null':
        return { kind: 'null' };
      default:
        return undefined;
    }
  }

  private readNumber(): AttributeValue | undefined {
    const match = NUMBER.exec(this.text.slice(this.pos));
    if (!match) return undefined;
    this.pos += match[0].length;
    return { kind: 'number', value: Number(match[0]) };
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.text.length && /[A-Za-z0-9_-]/.test(this.text[this.pos])) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private readString(): AttributeValue | undefined {
    const value = this.readQuoted();
    return value === undefined ? undefined : { kind: 'string', value };
  }

  /**
   * Read a quoted string. Templates (`${...}`, `%{...}`) are not literals.
   */
  private readQuoted(): string | undefined {
    let out = '';
    this.pos++;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      const next = this.text[this.pos + 1];
      if (ch === '"') {
        this.pos++;
        return out;
      }
      if (ch === '\n') return undefined;
      if (ch === '\\') {
        const escaped = this.readEscape();
        if (escaped === undefined) return undefined;
        out += escaped;
        continue;
      }
      if ((ch === '$' || ch === '%') && next === '{') return undefined;
      if ((ch === '$' || ch === '%') && next === ch && this.text[this.pos + 2] === '{') {
        out += `${ch}{`;
        this.pos += 3;
        continue;
      }
      out += ch;
      this.pos++;
    }
    return undefined;
  }

  private readEscape(): string | undefined {
    const code = this.text[this.pos + 1];
    this.pos += 2;
    switch (code) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      case '"':
        return '"';
      case '\\':
        return '\\';
      case 'u':
      case 'U': {
        const length = code === 'u' ? 4 : 8;
        const hex = this.text.slice(this.pos, this.pos + length);
        if (!/^[0-9A-Fa-f]+$/.test(hex) || hex.length !== length) return undefined;
        this.pos += length;
        return String.fromCodePoint(parseInt(hex, 16));
      }
      default:
        return undefined;
    }
  }

  private readList(): AttributeValue | undefined {
    const items: AttributeValue[] = [];
    this.pos++;
    this.skipTrivia();
    if (FOR_EXPRESSION.test(this.text.slice(this.pos))) return undefined;
    for (;;) {
      this.skipTrivia();
      if (this.text[this.pos] === ']') {
        this.pos++;
        return { kind: 'list', items };
      }
      const item = this.readItem(']');
      if (item === undefined) return undefined;
      items.push(item);
      this.skipTrivia();
      if (this.text[this.pos] === ',') {
        this.pos++;
      } else if (this.text[this.pos] !== ']') {
        return undefined;
      }
    }
  }

  private readObject(): ObjectValue | undefined {
    const fields: Array<[string, AttributeValue]> = [];
    this.pos++;
    for (;;) {
      this.skipTrivia();
      const ch = this.text[this.pos];
      if (ch === '}') {
        this.pos++;
        return { kind: 'object', fields };
      }
      let key: string | undefined;
      if (ch === '"') {
        key = this.readQuoted();
      } else {
        key = this.readWord();
        if (!IDENTIFIER.test(key)) key = undefined;
      }
      if (key === undefined) return undefined;
      this.skipTrivia();
      const separator = this.text[this.pos];
      if (separator !== '=' && separator !== ':') return undefined;
      this.pos++;
      this.skipInlineTrivia();
      const value = this.readItem('}');
      if (value === undefined) return undefined;
      fields.push([key, value]);
      this.skipTrivia();
      if (this.text[this.pos] === ',') this.pos++;
    }
  }

  /**
   * A list item or object field value: a literal when the whole item is
   * one, otherwise its source text as an expression.
   */
  private readItem(closer: ']' | '}'): AttributeValue | undefined {
    const start = this.pos;
    const value = this.readValue();
    if (value !== undefined && this.atItemEnd(closer)) return value;
    this.pos = start;
    return this.readRawItem(closer);
  }

  private atItemEnd(closer: ']' | '}'): boolean {
    const save = this.pos;
    this.skipInlineTrivia();
    const ch = this.text[this.pos];
    this.pos = save;
    return ch === ',' || ch === closer || ch === '\n' || ch === undefined;
  }

  /**
   * Source text up to the next top-level separator: a comma, the closing
   * bracket, or (in objects) a line break. Trailing comments are left out.
   */
  private readRawItem(closer: ']' | '}'): AttributeValue | undefined {
    const start = this.pos;
    let end = start;
    const closers: string[] = [];
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      const next = this.text[this.pos + 1];
      if (closers.length === 0 && (ch === ',' || ch === closer || (ch === '\n' && closer === '}'))) break;
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.pos++;
      } else if (ch === '#' || (ch === '/' && (next === '/' || next === '*'))) {
        this.skipInlineTrivia();
      } else if (ch === '"') {
        if (!this.skipQuoted()) return undefined;
        end = this.pos;
      } else if (ch === '<' && next === '<') {
        return undefined;
      } else {
        if (ch === '(') closers.push(')');
        else if (ch === '[') closers.push(']');
        else if (ch === '{') closers.push('}');
        else if (ch === ')' || ch === ']' || ch === '}') {
          if (closers.pop() !== ch) return undefined;
        }
        this.pos++;
        end = this.pos;
      }
    }
    if (closers.length > 0 || end === start) return undefined;
    return { kind: 'expression', text: this.text.slice(start, end) };
  }

  /** Skip a quoted string, templates included. */
  private skipQuoted(): boolean {
    this.pos++;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      const next = this.text[this.pos + 1];
      if (ch === '"') {
        this.pos++;
        return true;
      }
      if (ch === '\n') return false;
      if (ch === '\\') {
        this.pos += 2;
      } else if ((ch === '$' || ch === '%') && next === ch && this.text[this.pos + 2] === '{') {
        this.pos += 3;
      } else if ((ch === '$' || ch === '%') && next === '{') {
        this.pos += 2;
        if (!this.skipTemplate()) return false;
      } else {
        this.pos++;
      }
    }
    return false;
  }

  private skipTemplate(): boolean {
    let depth = 1;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '"') {
        if (!this.skipQuoted()) return false;
        continue;
      }
      if (ch === '{') depth++;
      if (ch === '}' && --depth === 0) {
        this.pos++;
        return true;
      }
      this.pos++;
    }
    return false;
  }

  /** Spaces, tabs and comments, stopping before a line break. */
  private skipInlineTrivia(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.pos++;
      } else if (ch === '#' || (ch === '/' && this.text[this.pos + 1] === '/')) {
        while (this.pos < this.text.length && this.text[this.pos] !== '\n') this.pos++;
      } else if (ch === '/' && this.text[this.pos + 1] === '*') {
        const close = this.text.indexOf('*/', this.pos + 2);
        this.pos = close < 0 ? this.text.length : close + 2;
      } else {
        return;
      }
    }
  }

  private skipTrivia(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
        this.pos++;
      } else if (ch === '#' || (ch === '/' && this.text[this.pos + 1] === '/')) {
        while (this.pos < this.text.length && this.text[this.pos] !== '\n') this.pos++;
      } else if (ch === '/' && this.text[this.pos + 1] === '*') {
        const end = this.text.indexOf('*/', this.pos + 2);
        this.pos = end < 0 ? this.text.length : end + 2;
      } else {
        return;
      }
    }
  }
}

/**
 * Render a value as HCL source.
 *
 * @param depth - indentation level of the line the value starts on
 */
export function renderValue(value: AttributeValue, depth = 0): string {
  switch (value.kind) {
    case 'string':
      return quoteString(value.value);
    case 'number':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'expression':
      return value.text;
    case 'list':
      return `[${value.items.map((item) => renderValue(item, depth)).join(', ')}]`;
    case 'object':
      return renderObject(value, depth);
  }
}

function renderObject(value: ObjectValue, depth: number): string {
  if (value.fields.length === 0) return '{}';
  const keys = value.fields.map(([key]) => (IDENTIFIER.test(key) ? key : quoteString(key)));
  const width = Math.max(...keys.map((key) => key.length));
  const inner = INDENT.repeat(depth + 1);
  const lines = value.fields.map(
    ([, field], i) => `${inner}${keys[i].padEnd(width)} = ${renderValue(field, depth + 1)}`
  );
  return `{\n${lines.join('\n')}\n${INDENT.repeat(depth)}}`;
}

export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, '%%{');
  return `"${escaped}"`;
}

export function indentation(depth: number): string {
  return INDENT.repeat(depth);
}
