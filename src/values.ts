/**
 * TOML value classes - the typed document tree produced by the parser
 *
 * Every value is immutable. Structural updates on tables (addKeyPath, assign)
 * copy the tables along the affected path and share everything else.
 */

import { DuplicateKeyError, EmptyKeyError, HeterogeneousArrayError } from './errors';
import { ErasedTable, ErasedValue, TomlValueKind } from './types';

export type KeyPathKind = 'table' | 'array';

export class TomlString {
  readonly kind = 'string';
  readonly value: string;

  constructor(value: string) {
    this.value = value;
    Object.freeze(this);
  }

  erase(): string {
    return this.value;
  }

  describe(): string {
    return JSON.stringify(this.value);
  }
}

export class TomlInteger {
  static readonly MIN = -(2n ** 63n);
  static readonly MAX = 2n ** 63n - 1n;

  readonly kind = 'integer';
  readonly value: bigint;

  constructor(value: bigint) {
    if (value < TomlInteger.MIN || value > TomlInteger.MAX) {
      throw new RangeError(`Integer out of 64-bit range: ${value}`);
    }
    this.value = value;
    Object.freeze(this);
  }

  static isInRange(value: bigint): boolean {
    return value >= TomlInteger.MIN && value <= TomlInteger.MAX;
  }

  /** A number when it is exactly representable, the bigint otherwise. */
  erase(): number | bigint {
    const asNumber = Number(this.value);
    return Number.isSafeInteger(asNumber) ? asNumber : this.value;
  }

  describe(): string {
    return this.value.toString();
  }
}

export class TomlFloat {
  readonly kind = 'float';
  readonly value: number;

  constructor(value: number) {
    this.value = value;
    Object.freeze(this);
  }

  erase(): number {
    return this.value;
  }

  describe(): string {
    return String(this.value);
  }
}

export class TomlBoolean {
  static readonly TRUE = new TomlBoolean(true);
  static readonly FALSE = new TomlBoolean(false);

  readonly kind = 'boolean';
  readonly value: boolean;

  private constructor(value: boolean) {
    this.value = value;
    Object.freeze(this);
  }

  static of(value: boolean): TomlBoolean {
    return value ? TomlBoolean.TRUE : TomlBoolean.FALSE;
  }

  erase(): boolean {
    return this.value;
  }

  describe(): string {
    return String(this.value);
  }
}

export class TomlDateTime {
  readonly kind = 'datetime';
  /** UTC instant in epoch milliseconds. */
  readonly epochMillis: number;
  /** Offset written in the source, in minutes east of UTC. */
  readonly offsetMinutes: number;

  constructor(epochMillis: number, offsetMinutes = 0) {
    this.epochMillis = epochMillis;
    this.offsetMinutes = offsetMinutes;
    Object.freeze(this);
  }

  get value(): Date {
    return new Date(this.epochMillis);
  }

  erase(): Date {
    return this.value;
  }

  describe(): string {
    return this.value.toISOString();
  }
}

export class TomlArray {
  static readonly empty = new TomlArray([]);

  readonly kind = 'array';
  readonly elements: readonly TomlValue[];

  private constructor(elements: readonly TomlValue[]) {
    this.elements = Object.freeze([...elements]);
    Object.freeze(this);
  }

  /**
   * Builds an array from an arbitrary sequence. Every adjacent pair is
   * checked, since nothing is known about how the sequence was put together.
   */
  static from(elements: readonly TomlValue[]): TomlArray {
    for (let i = 1; i < elements.length; i += 1) {
      const previous = elements[i - 1];
      const current = elements[i];
      if (previous !== undefined && current !== undefined && previous.kind !== current.kind) {
        throw new HeterogeneousArrayError(previous, current);
      }
    }
    return new TomlArray(elements);
  }

  get value(): readonly TomlValue[] {
    return this.elements;
  }

  get length(): number {
    return this.elements.length;
  }

  get first(): TomlValue | undefined {
    return this.elements[0];
  }

  get last(): TomlValue | undefined {
    return this.elements[this.elements.length - 1];
  }

  /** Kind shared by all elements, or undefined for an empty array. */
  get elementKind(): TomlValueKind | undefined {
    return this.first?.kind;
  }

  get isArrayOfTables(): boolean {
    return this.elements.length > 0 && this.elementKind === 'table';
  }

  append(value: TomlValue): TomlArray {
    // The existing elements already agree with each other, so only the new
    // boundary needs checking.
    const first = this.first;
    if (first !== undefined && first.kind !== value.kind) {
      throw new HeterogeneousArrayError(first, value);
    }
    return new TomlArray([...this.elements, value]);
  }

  /** Replaces the last element, which must be a table. */
  withLastTable(table: TomlTable): TomlArray {
    return new TomlArray([...this.elements.slice(0, -1), table]);
  }

  erase(): ErasedValue[] {
    return this.elements.map(element => element.erase());
  }

  describe(): string {
    return `[${this.elements.map(element => element.describe()).join(', ')}]`;
  }
}

export class TomlTable {
  static readonly empty = new TomlTable();

  readonly kind = 'table';
  private readonly entries: ReadonlyMap<string, TomlValue>;

  constructor(entries: Iterable<readonly [string, TomlValue]> = []) {
    this.entries = new Map(entries);
    Object.freeze(this);
  }

  /** A fresh copy of the entries; the table itself never changes. */
  get value(): Map<string, TomlValue> {
    return new Map(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): TomlValue | undefined {
    return this.entries.get(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Creates the table (or appends a new table to the array of tables) named
   * by `path`, creating missing intermediate tables on the way. Intermediate
   * arrays of tables resolve to their most recent element.
   */
  addKeyPath(kind: KeyPathKind, path: readonly string[]): TomlTable {
    assertNonEmptyPath(path);
    return this.addKeyPathFrom(kind, path, 0);
  }

  /**
   * Sets `key` in the table addressed by `prefix`. The key must not already
   * exist there.
   */
  assign(prefix: readonly string[], key: string, value: TomlValue): TomlTable {
    if (!key || prefix.some(segment => !segment)) {
      throw new EmptyKeyError();
    }
    return this.assignFrom(prefix, 0, key, value);
  }

  erase(): ErasedTable {
    return Object.fromEntries(
      [...this.entries].map(([key, value]): [string, ErasedValue] => [key, value.erase()]),
    );
  }

  describe(): string {
    const body = [...this.entries].map(([key, value]) => `${key} = ${value.describe()}`).join(', ');
    return `{${body}}`;
  }

  private with(key: string, value: TomlValue): TomlTable {
    const entries = new Map(this.entries);
    entries.set(key, value);
    return new TomlTable(entries);
  }

  private addKeyPathFrom(kind: KeyPathKind, path: readonly string[], index: number): TomlTable {
    const head = path[index] ?? '';
    const existing = this.entries.get(head);

    if (index === path.length - 1) {
      // If a value already exists at the final key, it must match the kind of path.
      if (kind === 'array') {
        if (existing === undefined) {
          return this.with(head, TomlArray.empty.append(TomlTable.empty));
        }
        if (existing instanceof TomlArray) {
          // Any array takes a new table; append rejects one holding other kinds.
          return this.with(head, existing.append(TomlTable.empty));
        }
        throw new DuplicateKeyError(path);
      }
      if (existing === undefined) {
        return this.with(head, TomlTable.empty);
      }
      if (existing instanceof TomlTable) {
        return this;
      }
      throw new DuplicateKeyError(path);
    }

    if (existing === undefined) {
      return this.with(head, TomlTable.empty.addKeyPathFrom(kind, path, index + 1));
    }
    if (existing instanceof TomlTable) {
      return this.with(head, existing.addKeyPathFrom(kind, path, index + 1));
    }
    const last = lastTableOf(existing);
    if (existing instanceof TomlArray && last) {
      return this.with(head, existing.withLastTable(last.addKeyPathFrom(kind, path, index + 1)));
    }
    throw new DuplicateKeyError(path.slice(0, index + 1));
  }

  private assignFrom(prefix: readonly string[], index: number, key: string, value: TomlValue): TomlTable {
    const head = prefix[index];
    if (head === undefined) {
      if (this.entries.has(key)) {
        throw new DuplicateKeyError([...prefix, key]);
      }
      return this.with(key, value);
    }

    const existing = this.entries.get(head);
    if (existing === undefined) {
      return this.with(head, TomlTable.empty.assignFrom(prefix, index + 1, key, value));
    }
    if (existing instanceof TomlTable) {
      return this.with(head, existing.assignFrom(prefix, index + 1, key, value));
    }
    const last = lastTableOf(existing);
    if (existing instanceof TomlArray && last) {
      return this.with(head, existing.withLastTable(last.assignFrom(prefix, index + 1, key, value)));
    }
    throw new DuplicateKeyError(prefix.slice(0, index + 1));
  }
}

export type TomlValue = TomlString | TomlInteger | TomlFloat | TomlBoolean | TomlDateTime | TomlArray | TomlTable;

function lastTableOf(value: TomlValue): TomlTable | undefined {
  if (value instanceof TomlArray) {
    const last = value.last;
    return last instanceof TomlTable ? last : undefined;
  }
  return undefined;
}

function assertNonEmptyPath(path: readonly string[]): void {
  if (path.length === 0 || path.some(segment => !segment)) {
    throw new EmptyKeyError();
  }
}
