/**
 * Type definitions for the TOML parser
 */

// Value variants of a parsed document
export type TomlValueKind = 'string' | 'integer' | 'float' | 'boolean' | 'datetime' | 'array' | 'table';

// Plain-data representations of parsed values
export type ErasedScalar = string | number | bigint | boolean | Date;
export type ErasedValue = ErasedScalar | ErasedValue[] | ErasedTable;
export interface ErasedTable {
  [key: string]: ErasedValue;
}

// Parser configuration options
export interface ParserOptions {
  /** Name used in diagnostics, e.g. the path a document was read from. */
  source?: string;
  /** Maximum nesting depth of inline arrays. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;
