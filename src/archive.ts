/**
 * Archive - container for the top-level records read from one or more
 * plain text sources
 */

import { DiagnosticSink } from './diagnostics';
import { FieldInput, Item } from './item';
import { ArchiveRecord, RecordSink } from './types';

export class Archive extends Item implements RecordSink {
  constructor(name = 'archive', fields: FieldInput = [], sink?: DiagnosticSink) {
    super(name || 'archive', fields, sink);
  }

  get type(): string {
    return 'archive';
  }

  public accept(kind: string, record: ArchiveRecord): void {
    this.insertChild(kind, record);
  }

  /** Roles of the named collection, in the order they were added. */
  public roles(collectionName: string): Item[] {
    return this.collection(collectionName)?.roles() ?? [];
  }
}
