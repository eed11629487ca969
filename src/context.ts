/**
 * TomlContext - folds parsed statements into a single document table
 */

import { DuplicateKeyError } from './errors';
import { KeyPathKind, TomlTable, TomlValue } from './values';

export class Assignment {
  readonly type = 'assignment';
  readonly key: string;
  readonly value: TomlValue;
  /** Character offset of the statement in the source, when parsed from text. */
  readonly offset: number | undefined;

  constructor(key: string, value: TomlValue, offset?: number) {
    this.key = key;
    this.value = value;
    this.offset = offset;
  }
}

export abstract class KeyPath {
  abstract readonly type: 'table' | 'array';
  readonly keys: readonly string[];
  readonly offset: number | undefined;

  constructor(keys: readonly string[], offset?: number) {
    this.keys = Object.freeze([...keys]);
    this.offset = offset;
  }

  get kind(): KeyPathKind {
    return this.type;
  }
}

export class TableKeyPath extends KeyPath {
  readonly type = 'table';
}

export class ArrayKeyPath extends KeyPath {
  readonly type = 'array';
}

export type Statement = Assignment | TableKeyPath | ArrayKeyPath;

export const ROOT_PATH = new TableKeyPath([]);

export class TomlContext {
  private table: TomlTable;
  private path: KeyPath;
  private readonly pathsUsed: Set<string>;

  constructor(table: TomlTable = TomlTable.empty, path: KeyPath = ROOT_PATH, pathsUsed: Iterable<string> = []) {
    this.table = table;
    this.path = path;
    this.pathsUsed = new Set(pathsUsed);
  }

  get document(): TomlTable {
    return this.table;
  }

  get currentPath(): KeyPath {
    return this.path;
  }

  /** Whether `keys` was declared with an explicit `[table]` header. */
  isDeclared(keys: readonly string[]): boolean {
    return this.pathsUsed.has(pathKey(keys));
  }

  update(statement: Statement): void {
    switch (statement.type) {
      case 'table': {
        // Tables created as a side effect of a longer path may be declared
        // later, but a header may only appear once.
        const key = pathKey(statement.keys);
        if (this.pathsUsed.has(key)) {
          throw new DuplicateKeyError(statement.keys);
        }
        this.table = this.table.addKeyPath(statement.kind, statement.keys);
        this.path = statement;
        this.pathsUsed.add(key);
        break;
      }
      case 'array':
        this.table = this.table.addKeyPath(statement.kind, statement.keys);
        this.path = statement;
        break;
      case 'assignment':
        this.table = this.table.assign(this.path.keys, statement.key, statement.value);
        break;
    }
  }

  updateAll(statements: Iterable<Statement>): TomlTable {
    for (const statement of statements) {
      this.update(statement);
    }
    return this.table;
  }
}

function pathKey(keys: readonly string[]): string {
  return JSON.stringify(keys);
}
