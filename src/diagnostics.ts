/**
 * Non-fatal problems raised while records are built.
 *
 * A sink is handed explicitly to whatever may complain; nothing here is
 * global. The reader keeps one sink per ingestion and the record builder
 * opens a short-lived one around each construction.
 */

import { formatLocation } from './errors';

export interface Diagnostic {
  message: string;
  source?: string | undefined;
  row?: number | undefined;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = formatLocation(diagnostic);
  return where ? `${diagnostic.message} (found in ${where})` : diagnostic.message;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

export class DiagnosticSink {
  private readonly entries: Diagnostic[] = [];
  private readonly listener: DiagnosticListener | undefined;

  constructor(listener?: DiagnosticListener) {
    this.listener = listener;
  }

  report(message: string): void {
    this.emit({ message });
  }

  emit(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    if (this.listener) {
      this.listener(diagnostic);
    }
  }

  get count(): number {
    return this.entries.length;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  /** Removes and returns everything collected so far. */
  drain(): Diagnostic[] {
    return this.entries.splice(0, this.entries.length);
  }
}
