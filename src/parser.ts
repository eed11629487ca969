/**
 * TOML Parser - recursive-descent grammar and public entry points
 *
 * Main entry points: parse(content), load(path) and loads(content)
 */

import * as fs from 'fs';
import { ArrayKeyPath, Assignment, Statement, TableKeyPath, TomlContext } from './context';
import { EmptyKeyError, TomlError } from './errors';
import { TomlLexer, WS_CHARS, isNewlineChar } from './lexer';
import { SourceText } from './source';
import { DEFAULT_MAX_DEPTH, ErasedTable, ParserOptions } from './types';
import {
  TomlArray,
  TomlBoolean,
  TomlDateTime,
  TomlFloat,
  TomlInteger,
  TomlString,
  TomlTable,
  TomlValue,
} from './values';

const IDENT_EXCLUDED_CHARS = '=#.[]' + WS_CHARS;

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && !IDENT_EXCLUDED_CHARS.includes(ch);
}

// ============================================================================
// TomlGrammar - value and statement rules
// ============================================================================

export class TomlGrammar extends TomlLexer {
  private readonly maxDepth: number;
  private depth = 0;

  constructor(input: SourceText | string, options: ParserOptions = {}) {
    super(input);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** Whole document: statements folded left to right, then the end of input. */
  parseDocument(): TomlTable {
    return this.rule('document', () => {
      const context = new TomlContext();
      this.skipWhitespaceAndComments();
      while (!this.atEnd) {
        const statement = this.parseStatement();
        if (statement === null) {
          return this.failAtFurthest();
        }
        this.apply(context, statement);
      }
      return context.document;
    });
  }

  parseStatement(): Statement | null {
    return this.rule('statement', () => {
      const statement = this.arrayKeyPath() ?? this.tableKeyPath() ?? this.assignment();
      if (statement === null) {
        return null;
      }
      if (!this.matchEndOfLine()) {
        this.failExpecting('end of line');
      }
      this.skipWhitespaceAndComments();
      return statement;
    });
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  assignment(): Assignment | null {
    return this.rule('assignment', () => {
      const start = this.pos;
      const key = this.identifier();
      if (key === null) {
        if (this.peek() === '=') {
          throw new EmptyKeyError(this.locate(this.pos));
        }
        return null;
      }
      this.skipNonNewlineWhitespace();
      if (!this.matchChar('=')) {
        return this.backtrack(start);
      }
      this.skipNonNewlineWhitespace();
      const value = this.parseValue();
      if (value === null) {
        return this.failExpecting('value');
      }
      this.skipNonNewlineWhitespace();
      return new Assignment(key, value, start);
    });
  }

  arrayKeyPath(): ArrayKeyPath | null {
    return this.rule('array of tables header', () => {
      const start = this.pos;
      if (!this.lookingAt('[[')) {
        this.miss('"[["');
        return null;
      }
      this.pos += 2;
      const keys = this.keyPathSegments(']]');
      return new ArrayKeyPath(keys, start);
    });
  }

  tableKeyPath(): TableKeyPath | null {
    return this.rule('table header', () => {
      const start = this.pos;
      if (!this.matchChar('[')) {
        return null;
      }
      const keys = this.keyPathSegments(']');
      return new TableKeyPath(keys, start);
    });
  }

  /**
   * Bare key: runs of key characters, possibly separated by spaces or tabs,
   * captured as written.
   */
  identifier(): string | null {
    const start = this.pos;
    if (!isIdentChar(this.peek())) {
      this.miss('key');
      return null;
    }
    this.skipIdentChars();
    for (;;) {
      const save = this.pos;
      this.skipNonNewlineWhitespace();
      if (!isIdentChar(this.peek())) {
        this.pos = save;
        break;
      }
      this.skipIdentChars();
    }
    return this.text.slice(start, this.pos);
  }

  private skipIdentChars(): void {
    while (isIdentChar(this.peek())) {
      this.pos += 1;
    }
  }

  private keyPathSegments(closing: string): string[] {
    this.skipNonNewlineWhitespace();
    const keys: string[] = [];
    for (;;) {
      const key = this.identifier();
      if (key === null) {
        if (this.peek() === '.' || this.peek() === ']') {
          throw new EmptyKeyError(this.locate(this.pos));
        }
        return this.failExpecting('key');
      }
      keys.push(key);
      if (this.peek() !== '.') {
        break;
      }
      this.pos += 1;
    }
    this.skipNonNewlineWhitespace();
    if (!this.lookingAt(closing)) {
      return this.failExpecting(JSON.stringify(closing));
    }
    this.pos += closing.length;
    this.skipNonNewlineWhitespace();
    return keys;
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  /**
   * Integers are tried last among the numeric forms: a bare digit sequence is
   * a prefix of both floats and date-times.
   */
  parseValue(): TomlValue | null {
    return this.rule('value', () => {
      const value = this.dateTime()
        ?? this.float()
        ?? this.integer()
        ?? this.boolean()
        ?? this.array()
        ?? this.string();
      if (value === null) {
        this.miss('value');
        return null;
      }
      this.skipNonNewlineWhitespace();
      return value;
    });
  }

  /** RFC 3339 date-time with a mandatory offset. */
  dateTime(): TomlDateTime | null {
    return this.rule('date-time', () => {
      const start = this.pos;
      const year = this.readFixedDigits(4);
      if (year === null || !this.matchChar('-')) return this.backtrack(start);
      const month = this.readFixedDigits(2);
      if (month === null || !this.matchChar('-')) return this.backtrack(start);
      const day = this.readFixedDigits(2);
      if (day === null || !this.matchChar('T')) return this.backtrack(start);
      const hour = this.readFixedDigits(2);
      if (hour === null || !this.matchChar(':')) return this.backtrack(start);
      const minute = this.readFixedDigits(2);
      if (minute === null || !this.matchChar(':')) return this.backtrack(start);
      const second = this.readFixedDigits(2);
      if (second === null) return this.backtrack(start);

      const fractionStart = this.pos;
      const fraction = this.matchDecimalPart() ? this.text.slice(fractionStart + 1, this.pos) : '';

      let offsetMinutes = 0;
      if (!this.matchChar('Z')) {
        const sign = this.peek();
        if (sign !== '+' && sign !== '-') {
          this.miss('"+"');
          this.miss('"-"');
          return this.backtrack(start);
        }
        this.pos += 1;
        const offsetHour = this.readFixedDigits(2);
        if (offsetHour === null || !this.matchChar(':')) return this.backtrack(start);
        const offsetMinute = this.readFixedDigits(2);
        if (offsetMinute === null) return this.backtrack(start);
        if (Number(offsetHour) > 23 || Number(offsetMinute) > 59) {
          return this.fail(`Invalid date-time offset: ${this.text.slice(start, this.pos)}`, start);
        }
        offsetMinutes = (sign === '-' ? -1 : 1) * (Number(offsetHour) * 60 + Number(offsetMinute));
      }

      const epochMillis = toEpochMillis(
        Number(year), Number(month), Number(day),
        Number(hour), Number(minute), Number(second),
        fraction, offsetMinutes,
      );
      if (epochMillis === null) {
        return this.fail(`Invalid date-time: ${this.text.slice(start, this.pos)}`, start);
      }
      return new TomlDateTime(epochMillis, offsetMinutes);
    });
  }

  /** Integer part followed by a fractional part, an exponent, or both. */
  float(): TomlFloat | null {
    return this.rule('float', () => {
      const start = this.pos;
      if (!this.matchSignedInteger()) {
        return null;
      }
      const hasFraction = this.matchDecimalPart();
      const hasExponent = this.matchExponent();
      if (!hasFraction && !hasExponent) {
        return this.backtrack(start);
      }
      return new TomlFloat(Number(this.text.slice(start, this.pos)));
    });
  }

  integer(): TomlInteger | null {
    return this.rule('integer', () => {
      const start = this.pos;
      if (!this.matchSignedInteger()) {
        return null;
      }
      const literal = this.text.slice(start, this.pos);
      const value = BigInt(literal.startsWith('+') ? literal.slice(1) : literal);
      if (!TomlInteger.isInRange(value)) {
        return this.fail(`Integer out of 64-bit range: ${literal}`, start);
      }
      return new TomlInteger(value);
    });
  }

  boolean(): TomlBoolean | null {
    return this.rule('boolean', () => {
      for (const literal of ['true', 'false']) {
        if (this.lookingAt(literal)) {
          this.pos += literal.length;
          return TomlBoolean.of(literal === 'true');
        }
        this.miss(JSON.stringify(literal));
      }
      return null;
    });
  }

  /** Bracketed values; may span lines and hold comments, a trailing comma is allowed. */
  array(): TomlArray | null {
    return this.rule('array', () => {
      const start = this.pos;
      if (!this.matchChar('[')) {
        return null;
      }
      if (this.depth >= this.maxDepth) {
        return this.fail(`Maximum nesting depth of ${this.maxDepth} exceeded`, start);
      }
      this.depth += 1;
      try {
        let array = TomlArray.empty;
        this.skipWhitespaceAndComments();
        if (this.matchChar(']')) {
          return array;
        }
        for (;;) {
          const elementStart = this.pos;
          const value = this.parseValue();
          if (value === null) {
            return this.failExpecting('value');
          }
          array = this.appendElement(array, value, elementStart);
          this.skipWhitespaceAndComments();
          if (this.matchChar(',')) {
            this.skipWhitespaceAndComments();
            if (this.matchChar(']')) {
              return array;
            }
            continue;
          }
          if (this.matchChar(']')) {
            return array;
          }
          return this.failExpecting('"," or "]"');
        }
      } finally {
        this.depth -= 1;
      }
    });
  }

  /** Multi-line forms first: their opening quotes start with the single-line ones. */
  string(): TomlString | null {
    return this.multiLineBasicString()
      ?? this.basicString()
      ?? this.multiLineLiteralString()
      ?? this.literalString();
  }

  multiLineBasicString(): TomlString | null {
    return this.rule('multi-line basic string', () => {
      if (!this.lookingAt('"""')) {
        this.miss('"\\"\\"\\""');
        return null;
      }
      this.pos += 3;
      this.skipLeadingNewline();
      let content = '';
      for (;;) {
        if (this.lookingAt('"""')) {
          this.pos += 3;
          return new TomlString(content);
        }
        if (this.atEnd) {
          return this.failExpecting('"\\"\\"\\""');
        }
        if (this.matchLineContinuation()) {
          continue;
        }
        if (this.peek() === '\\') {
          content += this.decodeEscape();
          continue;
        }
        content += this.text.charAt(this.pos);
        this.pos += 1;
      }
    });
  }

  basicString(): TomlString | null {
    return this.rule('basic string', () => {
      if (!this.matchChar('"')) {
        return null;
      }
      let content = '';
      for (;;) {
        const ch = this.peek();
        if (ch === '"') {
          this.pos += 1;
          return new TomlString(content);
        }
        if (ch === undefined || isNewlineChar(ch)) {
          return this.failExpecting('"\\""');
        }
        if (ch === '\\') {
          content += this.decodeEscape();
          continue;
        }
        content += ch;
        this.pos += 1;
      }
    });
  }

  multiLineLiteralString(): TomlString | null {
    return this.rule('multi-line literal string', () => {
      if (!this.lookingAt("'''")) {
        this.miss('"\'\'\'"');
        return null;
      }
      this.pos += 3;
      this.skipLeadingNewline();
      const end = this.text.indexOf("'''", this.pos);
      if (end === -1) {
        this.pos = this.text.length;
        return this.failExpecting('"\'\'\'"');
      }
      const content = this.text.slice(this.pos, end);
      this.pos = end + 3;
      return new TomlString(content);
    });
  }

  literalString(): TomlString | null {
    return this.rule('literal string', () => {
      if (!this.matchChar("'")) {
        return null;
      }
      const start = this.pos;
      for (;;) {
        const ch = this.peek();
        if (ch === "'") {
          const content = this.text.slice(start, this.pos);
          this.pos += 1;
          return new TomlString(content);
        }
        if (ch === undefined || isNewlineChar(ch)) {
          return this.failExpecting('"\'"');
        }
        this.pos += 1;
      }
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  // Only a line feed directly after the opening quotes is trimmed; a CRLF
  // pair is kept in the content.
  private skipLeadingNewline(): void {
    if (this.peek() === '\n') {
      this.pos += 1;
    }
  }

  private appendElement(array: TomlArray, value: TomlValue, offset: number): TomlArray {
    try {
      return array.append(value);
    } catch (error) {
      throw this.withLocation(error, offset);
    }
  }

  private apply(context: TomlContext, statement: Statement): void {
    try {
      context.update(statement);
    } catch (error) {
      throw this.withLocation(error, statement.offset ?? this.pos);
    }
  }

  private withLocation(error: unknown, offset: number): unknown {
    if (error instanceof TomlError && !error.hasLocation) {
      return error.locate(this.locate(offset));
    }
    return error;
  }
}

function toEpochMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  fraction: string,
  offsetMinutes: number,
): number | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 60) {
    return null;
  }
  // setUTCFullYear keeps years below 100 as written, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCDate() !== day) {
    return null;
  }
  date.setUTCHours(hour, minute, 0, 0);
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  return date.getTime() + second * 1000 + millis - offsetMinutes * 60_000;
}

// ============================================================================
// Public API
// ============================================================================

export type ParseResult =
  | { ok: true; document: TomlTable }
  | { ok: false; error: TomlError };

export class TomlParser {
  private document: TomlTable | null = null;
  private readonly options: ParserOptions;

  constructor(options: ParserOptions = {}) {
    this.options = options;
  }

  public static parse(content: string, options?: ParserOptions): TomlTable {
    const parser = new TomlParser(options);
    return parser.parseContent(content);
  }

  public static parseFile(filePath: string, options?: ParserOptions): TomlTable {
    const parser = new TomlParser(options);
    return parser.parseFile(filePath);
  }

  public parseContent(content: string, source: string | undefined = this.options.source): TomlTable {
    const grammar = new TomlGrammar(new SourceText(content, source), this.options);
    const document = grammar.parseDocument();
    this.document = document;
    return document;
  }

  public parseFile(filePath: string): TomlTable {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new TomlError(`Can only load path if is a regular file: ${filePath}`, { source: filePath });
    }
    const content = fs.readFileSync(filePath, 'utf-8');
    return this.parseContent(content.replace(/^\uFEFF/, ''), this.options.source ?? filePath);
  }

  public getDocument(): TomlTable {
    if (!this.document) {
      throw new TomlError('Parser document not initialized. Call parseContent or parseFile first.');
    }
    return this.document;
  }
}

export function parse(content: string, options?: ParserOptions): TomlTable {
  return TomlParser.parse(content, options);
}

/** Like parse(), but reports TOML errors as a value. Other exceptions propagate. */
export function tryParse(content: string, options?: ParserOptions): ParseResult {
  try {
    return { ok: true, document: TomlParser.parse(content, options) };
  } catch (error) {
    if (error instanceof TomlError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function load(filePath: string, options?: ParserOptions): ErasedTable {
  return TomlParser.parseFile(filePath, options).erase();
}

export function loads(content: string, options?: ParserOptions): ErasedTable {
  return TomlParser.parse(content, options).erase();
}
