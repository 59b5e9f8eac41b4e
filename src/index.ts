/**
 * Plain text identity archives
 * Main entry point for the archive reader and the record kinds it builds
 */

export { ArchiveReader, BlockParser, load, loads, splitKeywordLine, matchReferenceLine } from './parser';
export type { ReadResult, ArchiveInput, KeywordLine, BlockParserOptions } from './parser';
export { LineReader, expandTabs, leadingWhitespace, DEFAULT_TAB_WIDTH } from './lexer';
export type { LogicalLine, LineReaderOptions } from './lexer';
export { AbbreviationRegistry } from './registry';
export { buildRecord } from './builder';
export type { BuildContext, BuildOutcome } from './builder';
export { DiagnosticSink, formatDiagnostic } from './diagnostics';
export type { Diagnostic, DiagnosticListener } from './diagnostics';
export { ArchiveError, createArchiveError, formatLocation, locateError } from './errors';
export type { SourceLocation } from './errors';
export { createLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export { readerOptionsSchema, readOptionsSchema, DEFAULT_MAX_DEPTH } from './options';
export type { ArchiveReaderOptions, ReadOptions } from './options';
export { Archive } from './archive';
export { Item, Collection, Emails, Locations, Systems, Users } from './item';
export type { FieldInput, ItemJSON, RoleSelector } from './item';
export { ItemArena } from './arena';
export type { ItemId } from './arena';
export { User } from './user';
export { Email } from './email';
export type { MailAddress } from './email';
export { Location } from './location';
export { System } from './system';
export { userKind, emailKind, locationKind, systemKind, emailListKind, DEFAULT_ABBREVIATIONS } from './kinds';
export type { ArchiveRecord, FieldList, RecordKind, RecordSink, ReferenceAttempt } from './types';

// Default export for convenience
export { loads as default } from './parser';
