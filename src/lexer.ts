/**
 * TOML Lexer - cursor, lexical primitives and failure bookkeeping shared by the grammar rules
 */

import { SourceLocation, TomlSyntaxError } from './errors';
import { SourceText } from './source';

export const NEWLINE_CHARS = '\n\r\f';
export const NON_NEWLINE_WS_CHARS = ' \t';
export const WS_CHARS = NON_NEWLINE_WS_CHARS + NEWLINE_CHARS;

const SIMPLE_ESCAPES = new Map<string, string>([
  ['"', '"'],
  ["'", "'"],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

interface FailurePoint {
  offset: number;
  expected: Set<string>;
  rules: string[];
}

export function isNewlineChar(ch: string | undefined): boolean {
  return ch !== undefined && ch !== '' && NEWLINE_CHARS.includes(ch);
}

export function isNonNewlineWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9a-fA-F]$/.test(ch);
}

export function describeInput(ch: string | undefined): string {
  if (ch === undefined) {
    return 'end of input';
  }
  if (isNewlineChar(ch)) {
    return 'newline';
  }
  return JSON.stringify(ch);
}

export class TomlLexer {
  readonly source: SourceText;
  protected readonly text: string;
  protected pos = 0;
  private readonly ruleStack: string[] = [];
  private furthest: FailurePoint = { offset: -1, expected: new Set(), rules: [] };

  constructor(input: SourceText | string) {
    this.source = typeof input === 'string' ? new SourceText(input) : input;
    this.text = this.source.text;
  }

  get cursor(): number {
    return this.pos;
  }

  get atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(offset = 0): string | undefined {
    return this.text[this.pos + offset];
  }

  lookingAt(literal: string): boolean {
    return this.text.startsWith(literal, this.pos);
  }

  // ==========================================================================
  // Whitespace, comments and line ends
  // ==========================================================================

  skipNonNewlineWhitespace(): void {
    while (isNonNewlineWhitespace(this.peek())) {
      this.pos += 1;
    }
  }

  matchNewline(): boolean {
    if (isNewlineChar(this.peek())) {
      this.pos += 1;
      return true;
    }
    this.miss('newline');
    return false;
  }

  /**
   * Optional comment followed by a newline or the end of input. The newline
   * itself is left for the caller.
   */
  matchEndOfLine(): boolean {
    const start = this.pos;
    if (this.peek() === '#') {
      this.skipComment();
    }
    if (this.atEnd || isNewlineChar(this.peek())) {
      return true;
    }
    this.miss('end of line');
    this.pos = start;
    return false;
  }

  /** Whitespace, newlines and comments between statements. Stops just short of the end of input. */
  skipWhitespaceAndComments(): void {
    for (;;) {
      this.skipNonNewlineWhitespace();
      if (this.peek() === '#') {
        this.skipComment();
      }
      if (!isNewlineChar(this.peek())) {
        return;
      }
      this.pos += 1;
    }
  }

  private skipComment(): void {
    while (!this.atEnd && !isNewlineChar(this.peek())) {
      this.pos += 1;
    }
  }

  // ==========================================================================
  // Escapes and line continuations
  // ==========================================================================

  /** Decodes the escape sequence at the cursor. The backslash commits. */
  decodeEscape(): string {
    return this.rule('escape sequence', () => {
      const start = this.pos;
      if (this.peek() !== '\\') {
        this.miss('"\\\\"');
        this.fail('Expected an escape sequence');
      }
      this.pos += 1;
      const ch = this.peek();
      const simple = ch === undefined ? undefined : SIMPLE_ESCAPES.get(ch);
      if (simple !== undefined) {
        this.pos += 1;
        return simple;
      }
      if (ch === 'u' || ch === 'U') {
        this.pos += 1;
        const hex = this.readHexDigits(ch === 'u' ? 4 : 8);
        const codePoint = parseInt(hex, 16);
        if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
          this.fail(`Invalid Unicode scalar value: ${hex}`, start);
        }
        return String.fromCodePoint(codePoint);
      }
      return this.fail(`Invalid escape sequence: \\${ch ?? ''}`, start);
    });
  }

  /**
   * A backslash directly followed by a newline swallows the newline and all
   * whitespace after it, newlines included.
   */
  matchLineContinuation(): boolean {
    if (this.peek() !== '\\' || !isNewlineChar(this.peek(1))) {
      return false;
    }
    this.pos += 2;
    while (isNonNewlineWhitespace(this.peek()) || isNewlineChar(this.peek())) {
      this.pos += 1;
    }
    return true;
  }

  private readHexDigits(count: number): string {
    const start = this.pos;
    for (let i = 0; i < count; i += 1) {
      if (!isHexDigit(this.peek())) {
        this.miss('hexadecimal digit');
        this.fail(`Expected ${count} hexadecimal digits`);
      }
      this.pos += 1;
    }
    return this.text.slice(start, this.pos);
  }

  // ==========================================================================
  // Numeric and date fragments
  // ==========================================================================

  /** Optional sign, then `0` or a digit sequence without leading zeros. */
  matchSignedInteger(): boolean {
    const start = this.pos;
    if (this.peek() === '+' || this.peek() === '-') {
      this.pos += 1;
    }
    const first = this.peek();
    if (first === '0') {
      this.pos += 1;
      return true;
    }
    if (isDigit(first)) {
      while (isDigit(this.peek())) {
        this.pos += 1;
      }
      return true;
    }
    this.miss('digit');
    this.pos = start;
    return false;
  }

  /** `.` followed by one or more digits. */
  matchDecimalPart(): boolean {
    const start = this.pos;
    if (this.peek() !== '.') {
      this.miss('"."');
      return false;
    }
    this.pos += 1;
    if (!isDigit(this.peek())) {
      this.miss('digit');
      this.pos = start;
      return false;
    }
    while (isDigit(this.peek())) {
      this.pos += 1;
    }
    return true;
  }

  /** `e` or `E` followed by a signed integer. */
  matchExponent(): boolean {
    const start = this.pos;
    if (this.peek() !== 'e' && this.peek() !== 'E') {
      this.miss('exponent');
      return false;
    }
    this.pos += 1;
    if (!this.matchSignedInteger()) {
      this.pos = start;
      return false;
    }
    return true;
  }

  /** Exactly `count` digits, or null with the cursor unchanged. */
  readFixedDigits(count: number): string | null {
    const start = this.pos;
    for (let i = 0; i < count; i += 1) {
      if (!isDigit(this.peek())) {
        this.miss('digit');
        this.pos = start;
        return null;
      }
      this.pos += 1;
    }
    return this.text.slice(start, this.pos);
  }

  matchChar(ch: string): boolean {
    if (this.peek() === ch) {
      this.pos += 1;
      return true;
    }
    this.miss(JSON.stringify(ch));
    return false;
  }

  // ==========================================================================
  // Rule bookkeeping and failures
  // ==========================================================================

  protected rule<T>(name: string, body: () => T): T {
    this.ruleStack.push(name);
    try {
      return body();
    } finally {
      this.ruleStack.pop();
    }
  }

  /** Records that `expected` would have matched at the cursor. */
  protected miss(expected: string): void {
    if (this.pos > this.furthest.offset) {
      this.furthest = { offset: this.pos, expected: new Set([expected]), rules: [...this.ruleStack] };
    } else if (this.pos === this.furthest.offset) {
      this.furthest.expected.add(expected);
    }
  }

  protected backtrack(start: number): null {
    this.pos = start;
    return null;
  }

  locate(offset: number): SourceLocation {
    return this.source.locate(offset);
  }

  /** Hard failure at `at`; nothing is retried once a production has committed. */
  fail(description: string, at: number = this.pos): never {
    const details = this.furthest.offset === at
      ? { expected: [...this.furthest.expected], rules: [...this.ruleStack] }
      : { expected: [], rules: [...this.ruleStack] };
    throw new TomlSyntaxError(description, this.locate(at), details);
  }

  /** Hard failure naming what was found at the cursor and what was wanted. */
  failExpecting(expected: string): never {
    this.miss(expected);
    return this.fail(`Unexpected ${describeInput(this.peek())}, expected ${expected}`);
  }

  /** Failure reported at the furthest point any alternative reached. */
  failAtFurthest(): never {
    const { offset, expected, rules } = this.furthest;
    if (offset < 0) {
      this.fail(`Unexpected ${describeInput(this.peek())}`);
    }
    const wanted = formatAlternatives([...expected]);
    throw new TomlSyntaxError(
      `Unexpected ${describeInput(this.text[offset])}, expected ${wanted}`,
      this.locate(offset),
      { expected: [...expected], rules },
    );
  }
}

function formatAlternatives(alternatives: string[]): string {
  if (alternatives.length <= 1) {
    return alternatives[0] ?? 'nothing';
  }
  return `${alternatives.slice(0, -1).join(', ')} or ${alternatives[alternatives.length - 1]}`;
}
