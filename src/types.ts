/**
 * Type definitions shared by the archive reader and the record kinds
 */

import type { DiagnosticSink } from './diagnostics';

// Ordered (field, value) pairs as collected from a block; duplicates allowed
export type FieldList = ReadonlyArray<readonly [string, string]>;

// What the parser needs from a constructed record
export interface ArchiveRecord {
  readonly type: string;
  readonly name: string;
  insertChild(kind: string, child: ArchiveRecord): void;
}

// Construction capability bound to a keyword
export interface RecordKind<R extends ArchiveRecord = ArchiveRecord> {
  readonly tag: string;
  construct(name: string, fields: FieldList, sink: DiagnosticSink): R;
}

// Receiver of finished top-level records
export interface RecordSink {
  accept(kind: string, record: ArchiveRecord): void;
}

// A `[group] name = lookup` line; recognised, never resolved
export interface ReferenceAttempt {
  group: string;
  name: string;
  lookup: string;
  source: string;
  row: number;
}
