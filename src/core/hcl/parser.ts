/**
 * Lossless parser for HCL configuration files.
 *
 * Recognizes bodies of attributes, blocks, comments and blank lines. An
 * attribute's expression is kept as source text; its extent is found by
 * tracking brackets, quoted strings with templates, heredocs and comments.
 */
import { ErrorCodes, ParseError } from '../../utils/errors.js';
import { Block, Body, ConfigFile, type AttributeNode } from './tree.js';

const HEREDOC_START = /^<<(-?)([A-Za-z_][A-Za-z0-9_-]*)\r?\n/;

export function parseConfig(text: string, filename = '<input>'): ConfigFile {
  return new Parser(text, filename).parseFile();
}

interface ExpressionExtent {
  end: number;
  commentStart?: number;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly filename: string
  ) {}

  parseFile(): ConfigFile {
    const body = new Body(0);
    this.parseBody(body, false);
    return new ConfigFile(this.filename, body);
  }

  /**
   * Parse body items until end of input or, when nested, until the closing
   * brace. Returns the offset where the closing line starts.
   */
  private parseBody(body: Body, nested: boolean): number {
    for (;;) {
      const lineStart = this.pos;
      this.skipSpaces();

      if (this.eof()) {
        if (nested) throw this.error('Unclosed block: expected "}"');
        if (this.pos > lineStart) {
          body.items.push({ kind: 'trivia', text: this.text.slice(lineStart) });
        }
        return this.pos;
      }

      if (this.atNewline()) {
        this.consumeNewline();
        body.items.push({ kind: 'trivia', text: this.text.slice(lineStart, this.pos) });
        continue;
      }

      if (this.atComment()) {
        this.skipComment();
        this.skipSpaces();
        if (this.atNewline()) this.consumeNewline();
        body.items.push({ kind: 'trivia', text: this.text.slice(lineStart, this.pos) });
        continue;
      }

      const ch = this.peek();
      if (ch === '}') {
        if (!nested) throw this.error('Unexpected "}"');
        return lineStart;
      }
      if (!isIdentifierStart(ch)) {
        throw this.error(`Unexpected character "${ch}"`);
      }

      const name = this.readIdentifier();
      this.skipSpaces();
      if (this.peek() === '=' && this.peek(1) !== '=') {
        body.items.push(this.parseAttribute(name, lineStart));
      } else {
        body.items.push(this.parseBlock(name, lineStart, body.depth));
      }
    }
  }

  private parseAttribute(name: string, lineStart: number): AttributeNode {
    this.pos++; // '='
    const exprStart = this.pos;
    const extent = this.scanExpression();
    const expression = this.text.slice(exprStart, extent.commentStart ?? extent.end).trim();
    if (expression === '') throw this.error(`Missing expression for attribute "${name}"`);
    const comment =
      extent.commentStart !== undefined
        ? this.text.slice(extent.commentStart, extent.end).trim()
        : undefined;

    const startsLine = lineStart === 0 || this.text[lineStart - 1] === '\n';
    let endsLine = this.eof();
    if (this.atNewline()) {
      this.consumeNewline();
      endsLine = true;
    }

    const attr: AttributeNode = { kind: 'attribute', name, expression };
    if (comment) attr.comment = comment;
    if (startsLine && endsLine) attr.raw = this.text.slice(lineStart, this.pos);
    return attr;
  }

  private parseBlock(type: string, lineStart: number, depth: number): Block {
    const labels: string[] = [];
    while (this.peek() !== '{') {
      if (this.eof()) throw this.error(`Unexpected end of input in "${type}" block header`);
      if (this.peek() === '"') {
        labels.push(this.readQuotedLabel());
      } else if (isIdentifierStart(this.peek())) {
        labels.push(this.readIdentifier());
      } else {
        throw this.error(`Expected block label or "{" after "${type}"`);
      }
      this.skipSpaces();
    }
    this.pos++; // '{'

    const afterBrace = this.pos;
    this.skipSpaces();
    let inline = true;
    if (this.atLineComment()) {
      this.skipComment();
      inline = false;
    }
    if (this.atNewline()) {
      this.consumeNewline();
      inline = false;
    }
    if (inline) this.pos = afterBrace;
    const headerRaw = this.text.slice(lineStart, this.pos);

    const block = new Block(type, labels, depth);
    const closingStart = this.parseBody(block.body, true);
    this.pos++; // '}'
    this.skipSpaces();
    if (this.atLineComment()) this.skipComment();
    if (this.atNewline()) this.consumeNewline();

    block.inline = inline;
    block.headerRaw = headerRaw;
    block.closingRaw = this.text.slice(closingStart, this.pos);
    block.raw = this.text.slice(lineStart, this.pos);
    return block;
  }

  /**
   * Find the end of an expression: a newline or "}" outside brackets, or a
   * trailing line comment.
   */
  private scanExpression(): ExpressionExtent {
    const closers: string[] = [];
    while (!this.eof()) {
      const ch = this.peek();
      if (closers.length === 0) {
        if (this.atNewline() || ch === '}') return { end: this.pos };
        if (this.atLineComment()) {
          const commentStart = this.pos;
          while (!this.eof() && !this.atNewline()) this.pos++;
          return { end: this.pos, commentStart };
        }
      }
      if (this.atComment()) {
        this.skipComment();
        continue;
      }
      switch (ch) {
        case '"':
          this.skipString();
          break;
        case '<':
          if (!this.skipHeredoc()) this.pos++;
          break;
        case '(':
          closers.push(')');
          this.pos++;
          break;
        case '[':
          closers.push(']');
          this.pos++;
          break;
        case '{':
          closers.push('}');
          this.pos++;
          break;
        case ')':
        case ']':
        case '}':
          if (closers.pop() !== ch) throw this.error(`Unbalanced "${ch}" in expression`);
          this.pos++;
          break;
        default:
          this.pos++;
      }
    }
    if (closers.length > 0) throw this.error(`Unexpected end of input: expected "${closers[closers.length - 1]}"`);
    return { end: this.pos };
  }

  private skipString(): void {
    const start = this.pos;
    this.pos++;
    while (!this.eof()) {
      const ch = this.peek();
      if (ch === '\\') {
        this.pos += 2;
      } else if (ch === '"') {
        this.pos++;
        return;
      } else if (ch === '\n') {
        break;
      } else if ((ch === '$' || ch === '%') && this.peek(1) === ch && this.peek(2) === '{') {
        this.pos += 3;
      } else if ((ch === '$' || ch === '%') && this.peek(1) === '{') {
        this.pos += 2;
        this.skipTemplate();
      } else {
        this.pos++;
      }
    }
    this.pos = start;
    throw this.error('Unterminated string');
  }

  /** Skip a template interpolation body, through its closing brace. */
  private skipTemplate(): void {
    let depth = 1;
    while (!this.eof()) {
      const ch = this.peek();
      if (ch === '"') {
        this.skipString();
        continue;
      }
      this.pos++;
      if (ch === '{') depth++;
      if (ch === '}' && --depth === 0) return;
    }
    throw this.error('Unterminated template interpolation');
  }

  private skipHeredoc(): boolean {
    const match = HEREDOC_START.exec(this.text.slice(this.pos, this.pos + 256));
    if (!match) return false;
    const marker = match[2];
    let lineStart = this.pos + match[0].length;
    while (lineStart < this.text.length) {
      let lineEnd = this.text.indexOf('\n', lineStart);
      if (lineEnd < 0) lineEnd = this.text.length;
      const line = this.text.slice(lineStart, lineEnd).replace(/\r$/, '');
      if (line.trim() === marker) {
        this.pos = lineStart + this.text.slice(lineStart, lineEnd).indexOf(marker) + marker.length;
        return true;
      }
      lineStart = lineEnd + 1;
    }
    throw this.error(`Unterminated heredoc "${marker}"`);
  }

  private readIdentifier(): string {
    const start = this.pos;
    while (!this.eof() && /[A-Za-z0-9_-]/.test(this.peek())) this.pos++;
    return this.text.slice(start, this.pos);
  }

  private readQuotedLabel(): string {
    let out = '';
    this.pos++;
    while (!this.eof()) {
      const ch = this.peek();
      if (ch === '"') {
        this.pos++;
        return out;
      }
      if (ch === '\n') break;
      if (ch === '\\') {
        out += this.peek(1);
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
    throw this.error('Unterminated block label');
  }

  /** Skip a comment. Line comments stop before their newline. */
  private skipComment(): void {
    if (this.peek() === '/' && this.peek(1) === '*') {
      const end = this.text.indexOf('*/', this.pos + 2);
      if (end < 0) throw this.error('Unterminated block comment');
      this.pos = end + 2;
      return;
    }
    while (!this.eof() && !this.atNewline()) this.pos++;
  }

  private skipSpaces(): void {
    while (!this.eof() && (this.peek() === ' ' || this.peek() === '\t')) this.pos++;
  }

  private atComment(): boolean {
    return this.atLineComment() || (this.peek() === '/' && this.peek(1) === '*');
  }

  private atLineComment(): boolean {
    return this.peek() === '#' || (this.peek() === '/' && this.peek(1) === '/');
  }

  private atNewline(): boolean {
    return this.peek() === '\n' || (this.peek() === '\r' && this.peek(1) === '\n');
  }

  private consumeNewline(): void {
    this.pos += this.peek() === '\r' ? 2 : 1;
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.pos + offset);
  }

  private eof(): boolean {
    return this.pos >= this.text.length;
  }

  private error(message: string): ParseError {
    const line = this.text.slice(0, this.pos).split('\n').length;
    return new ParseError(ErrorCodes.PARSE_ERROR, `${this.filename}:${line}: ${message}`, {
      filename: this.filename,
      line,
    });
  }
}

function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}
