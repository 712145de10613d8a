export * from './parser';
export * from './schema';
export { Condition, parseCondition, formatCondition } from './rules/conditionParser';
export type { ConditionExpr, LogicalOperator, ComparisonOperator } from './rules/conditionParser';
export { KicadFile, isKind } from './io/kicadFile';
export type { DocumentTypes, LoadOptions, FromStringOptions, SaveOptions } from './io/kicadFile';
export { createConfig, DEFAULT_CONFIG, DEFAULT_FORMAT } from './shared/config';
export type { LibraryConfig, ConfigOverrides, FormatOptions, Logger } from './shared/config';
export {
  KicadFileError, SExprSyntaxError, ConditionSyntaxError, EmptyDocumentError, SchemaError, UnsupportedVersionError,
  FileIOError, FormatError,
} from './shared/errors';
export type { SourcePosition } from './shared/errors';
export { getDocumentKind, getDocumentKindByKeyword, KICAD_EXTENSIONS, LIBRARY_TABLE_NAMES } from './shared/fileTypes';
export type { DocumentKind } from './shared/fileTypes';
