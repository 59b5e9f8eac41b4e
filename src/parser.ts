/**
 * Plain text archive reader
 *
 * Structure comes from indentation only: a line followed by a deeper
 * indented line starts a nested block, everything else inside a block is a
 * field. Main entry points: `ArchiveReader#from()`, `load(path)` and
 * `loads(content)`.
 */

import { Readable } from 'stream';
import { Archive } from './archive';
import { buildRecord } from './builder';
import { Diagnostic, DiagnosticSink, formatDiagnostic } from './diagnostics';
import { ArchiveError, locateError } from './errors';
import { LineReader, LogicalLine } from './lexer';
import { Logger, createLogger } from './logger';
import {
  ArchiveReaderOptions,
  ReadOptions,
  abbreviationEntries,
  onlyKeywords,
  parseReadOptions,
  parseReaderOptions,
} from './options';
import { AbbreviationRegistry } from './registry';
import { RawSource, normalizeLines, readSourceFile, readSourceStream, splitContentIntoLines } from './source';
import { ArchiveRecord, RecordKind, ReferenceAttempt } from './types';

// keyword, then the rest of the line
const KEYWORD_LINE_REGEX = /^\s*(\w+)\s*(.*?)\s*$/;
// [group] name = lookup
const REFERENCE_LINE_REGEX = /^\s*(?:(\w+)\s+)?(\w+)\s*=\s*(.*?)\s*$/;

export interface KeywordLine {
  keyword: string;
  rest: string;
}

export function splitKeywordLine(text: string): KeywordLine | undefined {
  const match = text.match(KEYWORD_LINE_REGEX);
  if (!match) {
    return undefined;
  }
  return { keyword: match[1] ?? '', rest: match[2] ?? '' };
}

export function matchReferenceLine(text: string): Omit<ReferenceAttempt, 'source' | 'row'> | undefined {
  const match = text.match(REFERENCE_LINE_REGEX);
  if (!match) {
    return undefined;
  }
  return { group: match[1] ?? '', name: match[2] ?? '', lookup: match[3] ?? '' };
}

export interface BlockParserOptions {
  sink: DiagnosticSink;
  logger: Logger;
  maxDepth: number;
  references: ReferenceAttempt[];
}

export class BlockParser {
  private readonly reader: LineReader;
  private readonly registry: AbbreviationRegistry;
  private readonly options: BlockParserOptions;

  constructor(reader: LineReader, registry: AbbreviationRegistry, options: BlockParserOptions) {
    this.reader = reader;
    this.registry = registry;
    this.options = options;
  }

  /**
   * Collects the block introduced by `starter`, which the caller has
   * already consumed. Lines indented no deeper than the starter end the
   * block and stay in the reader.
   *
   * Blocks with an unknown keyword are consumed and dropped, as are blocks
   * which end up without fields and without children.
   */
  parseBlock(starter: LogicalLine, depth = 1): ArchiveRecord | undefined {
    if (depth > this.options.maxDepth) {
      throw new ArchiveError(`Blocks nested deeper than ${this.options.maxDepth} levels`, {
        source: this.reader.source,
        row: starter.row,
        lineText: starter.text,
      });
    }

    const head = splitKeywordLine(starter.text);
    const kind: RecordKind | undefined = head ? this.registry.resolve(head.keyword) : undefined;
    const skip = kind === undefined;
    const fields: Array<[string, string]> = [];
    const children: ArchiveRecord[] = [];

    while (true) {
      const line = this.reader.peek();
      if (!line || line.indent <= starter.indent) {
        break;
      }
      this.reader.advance();

      if (skip) {
        continue;
      }

      // Only the following line decides whether this one opens a block
      const next = this.reader.peek();
      const nextIndent = next ? next.indent : -1;

      if (line.indent < nextIndent) {
        const child = this.parseBlock(line, depth + 1);
        if (child) {
          children.push(child);
        }
        continue;
      }

      const reference = matchReferenceLine(line.text);
      if (reference) {
        this.recordReference(reference, line);
        continue;
      }

      const field = splitKeywordLine(line.text);
      if (field) {
        fields.push([field.keyword, field.rest]);
      } else {
        this.options.sink.emit({
          message: `Cannot interpret line: ${line.text.trim()}`,
          source: this.reader.source,
          row: line.row,
        });
      }
    }

    if (kind === undefined || (fields.length === 0 && children.length === 0)) {
      return undefined;
    }

    const { record } = buildRecord(kind, head?.rest ?? '', fields, children, {
      source: this.reader.source,
      row: starter.row,
      lineText: starter.text,
      sink: this.options.sink,
    });
    return record;
  }

  // TODO: resolve lookups such as user(cleo).location(home) against the archive
  private recordReference(reference: Omit<ReferenceAttempt, 'source' | 'row'>, line: LogicalLine): void {
    const attempt: ReferenceAttempt = { ...reference, source: this.reader.source, row: line.row };
    this.options.references.push(attempt);
    this.options.logger.debug(
      { source: attempt.source, row: attempt.row },
      `reference ${attempt.group} ${attempt.name} = ${attempt.lookup} is not resolved`,
    );
  }
}

export interface ReadResult {
  archive: Archive;
  /** Top-level records of this read, in document order. */
  records: ArchiveRecord[];
  diagnostics: Diagnostic[];
  references: ReferenceAttempt[];
}

export type ArchiveInput = string | readonly string[] | Buffer;

export class ArchiveReader {
  readonly registry: AbbreviationRegistry;
  readonly archive: Archive;
  private tabstop: number;
  private readonly maxDepth: number;
  private readonly logger: Logger;
  private readonly setupDiagnostics: Diagnostic[] = [];

  constructor(options: ArchiveReaderOptions = {}) {
    const resolved = parseReaderOptions(options);
    this.logger = resolved.logger ?? createLogger({ name: 'archive-reader' });
    this.tabstop = resolved.tabstop;
    this.maxDepth = resolved.maxDepth;
    this.archive = new Archive(resolved.name);
    this.registry = new AbbreviationRegistry();

    const only = new Set(onlyKeywords(resolved.only));
    const seeded = [...AbbreviationRegistry.withDefaults().entries(), ...abbreviationEntries(resolved.abbreviations)];
    for (const [keyword, kind] of seeded) {
      if (only.size === 0 || only.has(keyword)) {
        this.registry.register(keyword, kind);
      }
    }
    for (const keyword of only) {
      if (!this.registry.has(keyword)) {
        const diagnostic: Diagnostic = { message: `Option 'only' specifies undefined abbreviation '${keyword}'` };
        this.setupDiagnostics.push(diagnostic);
        this.logger.warn(diagnostic.message);
      }
    }

    if (resolved.from !== undefined) {
      this.from(resolved.from);
    }
  }

  /** Problems found in the reader's own configuration. */
  get configurationDiagnostics(): readonly Diagnostic[] {
    return this.setupDiagnostics;
  }

  /** Tab width used for sources which do not set one with `tabstop =`. */
  get defaultTabStop(): number {
    return this.tabstop;
  }

  set defaultTabStop(width: number) {
    if (!Number.isInteger(width) || width < 1) {
      throw new ArchiveError(`Tab width must be at least 1, got ${width}`);
    }
    this.tabstop = width;
  }

  /**
   * With one argument the kind bound to `name`; with a second the binding is
   * added or replaced, or removed when that argument is `undefined`.
   */
  abbreviation(name: string): RecordKind | undefined;
  abbreviation(name: string, kind: RecordKind | undefined): RecordKind | undefined;
  abbreviation(name: string, ...kind: [] | [RecordKind | undefined]): RecordKind | undefined {
    if (kind.length === 0) {
      return this.registry.resolve(name);
    }
    return this.registry.register(name, kind[0]);
  }

  abbreviations(): string[] {
    return this.registry.listKeywords();
  }

  /**
   * Reads a file (given its path), an array of lines or a buffer. Records
   * are added to `archive`; the result lists what this read contributed.
   */
  from(input: ArchiveInput, options: ReadOptions = {}): ReadResult {
    if (typeof input === 'string') {
      return this.ingest(readSourceFile(input), options);
    }
    if (Buffer.isBuffer(input)) {
      return this.ingest({ label: 'buffer', lines: splitContentIntoLines(input.toString('utf-8')) }, options);
    }
    return this.ingest({ label: 'array', lines: normalizeLines(input) }, options);
  }

  fromString(content: string, options: ReadOptions = {}): ReadResult {
    return this.ingest({ label: 'string', lines: splitContentIntoLines(content) }, options);
  }

  async fromStream(stream: Readable, options: ReadOptions = {}): Promise<ReadResult> {
    const source = await readSourceStream(stream);
    return this.ingest(source, options);
  }

  private ingest(source: RawSource, options: ReadOptions): ReadResult {
    const { tabstop, source: labelOverride } = parseReadOptions(options);
    const label = labelOverride ?? source.label;
    const diagnostics = new DiagnosticSink(diagnostic => {
      this.logger.warn({ source: diagnostic.source, row: diagnostic.row }, formatDiagnostic(diagnostic));
    });
    const result: ReadResult = { archive: this.archive, records: [], diagnostics: [], references: [] };

    this.logger.debug({ source: label }, `reading data from ${label}`);
    if (source.lines.length === 0) {
      return result;
    }

    const reader = new LineReader(source.lines, { source: label, tabWidth: tabstop ?? this.tabstop });
    const parser = new BlockParser(reader, this.registry, {
      sink: diagnostics,
      logger: this.logger,
      maxDepth: this.maxDepth,
      references: result.references,
    });

    let starter = reader.peek();
    while (starter) {
      reader.advance();
      this.logger.trace({ source: label, row: starter.row }, `adding ${starter.text.trim()}`);
      const record = parser.parseBlock(starter);
      if (record) {
        try {
          this.archive.accept(record.type, record);
        } catch (error) {
          throw locateError(
            error,
            { source: label, row: starter.row, lineText: starter.text },
            `Cannot add ${record.type} "${record.name}" to archive "${this.archive.name}"`,
          );
        }
        result.records.push(record);
      }
      starter = reader.peek();
    }

    result.diagnostics = diagnostics.drain();
    return result;
  }
}

export function load(filePath: string, options?: ArchiveReaderOptions): Archive {
  const reader = new ArchiveReader(options);
  reader.from(filePath);
  return reader.archive;
}

export function loads(content: string, options?: ArchiveReaderOptions): Archive {
  const reader = new ArchiveReader(options);
  reader.fromString(content);
  return reader.archive;
}
