/**
 * Turns a collected block into a record.
 *
 * The record kind is called with a private diagnostic sink. Whatever it
 * reports is passed on to the reader's sink once construction is over,
 * stamped with the archive label and the line of the block's starter.
 */

import { DiagnosticSink } from './diagnostics';
import { SourceLocation, locateError } from './errors';
import { ArchiveRecord, FieldList, RecordKind } from './types';

export interface BuildContext {
  source: string;
  /** 1-based line of the block's starter line. */
  row: number;
  lineText?: string | undefined;
  sink: DiagnosticSink;
}

export interface BuildOutcome {
  record: ArchiveRecord;
  diagnosticCount: number;
}

export function buildRecord(
  kind: RecordKind,
  name: string,
  fields: FieldList,
  children: readonly ArchiveRecord[],
  context: BuildContext,
): BuildOutcome {
  const location: SourceLocation = { source: context.source, row: context.row, lineText: context.lineText };
  const captured = new DiagnosticSink();
  let diagnosticCount = 0;
  let record: ArchiveRecord;
  try {
    record = kind.construct(name, fields, captured);
  } catch (error) {
    throw locateError(error, location, `Cannot create ${kind.tag} "${name}"`);
  } finally {
    const diagnostics = captured.drain();
    diagnosticCount = diagnostics.length;
    for (const diagnostic of diagnostics) {
      context.sink.emit({ ...diagnostic, source: context.source, row: context.row });
    }
  }

  for (const child of children) {
    try {
      record.insertChild(child.type, child);
    } catch (error) {
      throw locateError(error, location, `Cannot add ${child.type} "${child.name}" to ${record.type} "${record.name}"`);
    }
  }

  return { record, diagnosticCount };
}
