/**
 * Fatal reader errors, optionally pinned to a line of the archive text.
 */

export interface SourceLocation {
  /** Archive label such as `file friends.txt` or `string`. */
  source?: string | undefined;
  /** 1-based physical line. */
  row?: number | undefined;
  lineText?: string | undefined;
}

export class ArchiveError extends Error {
  /** The message without location decoration. */
  readonly detail: string;
  readonly location: Readonly<SourceLocation>;

  constructor(detail: string, location: SourceLocation = {}) {
    super(describeError(detail, location));
    this.name = 'ArchiveError';
    this.detail = detail;
    this.location = { source: location.source, row: location.row, lineText: location.lineText };
  }

  get source(): string | undefined {
    return this.location.source;
  }

  get row(): number | undefined {
    return this.location.row;
  }

  get lineText(): string | undefined {
    return this.location.lineText;
  }

  get hasLocation(): boolean {
    return this.source !== undefined || this.row !== undefined;
  }

  /** A copy which fills in whatever part of `location` this error lacks. */
  locate(location: SourceLocation): ArchiveError {
    return new ArchiveError(this.detail, {
      source: this.source ?? location.source,
      row: this.row ?? location.row,
      lineText: this.lineText ?? location.lineText,
    });
  }
}

/** `source:row`, or whichever of the two is known. */
export function formatLocation(location: SourceLocation): string {
  const row = typeof location.row === 'number' ? String(location.row) : undefined;
  return [location.source || undefined, row].filter(part => part !== undefined).join(':');
}

function describeError(detail: string, location: SourceLocation): string {
  const where = formatLocation(location);
  const headline = where ? `${where} - ${detail}` : detail;
  const lineText = location.lineText?.trimEnd();
  return lineText ? `${headline}\n    ${lineText}` : headline;
}

export function createArchiveError(message: string, location?: SourceLocation): ArchiveError {
  return new ArchiveError(message, location ?? {});
}

/**
 * Ties `error` to `location`. An `ArchiveError` which already knows where
 * it came from passes unchanged; anything else is wrapped, prefixed with
 * `context`.
 */
export function locateError(error: unknown, location: SourceLocation, context: string): ArchiveError {
  if (error instanceof ArchiveError) {
    return error.hasLocation ? error : error.locate(location);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ArchiveError(`${context}: ${message}`, location);
}
