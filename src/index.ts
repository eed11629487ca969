/**
 * TOML recursive-descent parser
 * Main entry point: parse a document into a typed, immutable table tree
 */

export { TomlParser, TomlGrammar, parse, tryParse, load, loads } from './parser';
export type { ParseResult } from './parser';
export { TomlLexer } from './lexer';
export { TomlContext, Assignment, KeyPath, TableKeyPath, ArrayKeyPath, ROOT_PATH } from './context';
export type { Statement } from './context';
export {
  TomlString,
  TomlInteger,
  TomlFloat,
  TomlBoolean,
  TomlDateTime,
  TomlArray,
  TomlTable,
} from './values';
export type { TomlValue, KeyPathKind } from './values';
export {
  TomlError,
  TomlSyntaxError,
  TomlKeyError,
  EmptyKeyError,
  DuplicateKeyError,
  HeterogeneousArrayError,
} from './errors';
export type { SourceLocation } from './errors';
export { SourceText } from './source';
export type { ErasedValue, ErasedTable, ErasedScalar, ParserOptions, TomlValueKind } from './types';

// Default export for convenience
export { parse as default } from './parser';
