/**
 * Logical line assembly for plain text archives.
 *
 * Raw lines are folded into logical lines: comments and blank lines are
 * dropped, backslash continuations are joined and `tabstop = N` directives
 * are consumed. The parser pulls lines through `peek()` and `advance()`.
 */

import { ArchiveError } from './errors';

export const DEFAULT_TAB_WIDTH = 8;

const COMMENT_REGEX = /^\s*#/;
const CONTENT_REGEX = /\S/;
const CONTINUATION_REGEX = /\\\s*$/;
const TABSTOP_DIRECTIVE_REGEX = /^\s*tabstop\s*=\s*(\d+)/;
const LEADING_WHITESPACE_REGEX = /^\s*/;

/**
 * Column of the first character after `whitespace`. A tab always moves to
 * the next multiple of `tabWidth`, even when the column already sits on one.
 */
export function expandTabs(whitespace: string, tabWidth: number): number {
  let column = 0;
  for (const ch of whitespace) {
    if (ch === '\t') {
      column = (Math.floor(column / tabWidth) + 1) * tabWidth;
    } else {
      column += 1;
    }
  }
  return column;
}

export function leadingWhitespace(text: string): string {
  const match = text.match(LEADING_WHITESPACE_REGEX);
  return match ? match[0] : '';
}

export interface LogicalLine {
  text: string;
  /** 1-based number of the first physical line. */
  row: number;
  indent: number;
}

export interface LineReaderOptions {
  source: string;
  tabWidth?: number | undefined;
}

export class LineReader {
  readonly source: string;
  private readonly lines: readonly string[];
  private cursor = 0;
  private currentTabWidth: number;
  private buffered: LogicalLine | null | undefined;

  constructor(lines: readonly string[], options: LineReaderOptions) {
    this.lines = lines;
    this.source = options.source;
    this.currentTabWidth = options.tabWidth ?? DEFAULT_TAB_WIDTH;
  }

  get tabWidth(): number {
    return this.currentTabWidth;
  }

  /** The next logical line, left in place; `null` at end of input. */
  peek(): LogicalLine | null {
    if (this.buffered === undefined) {
      this.buffered = this.assemble();
    }
    return this.buffered;
  }

  /** Commits the line returned by the last `peek()`. */
  advance(): void {
    if (this.buffered === undefined) {
      this.peek();
    }
    this.buffered = undefined;
  }

  private assemble(): LogicalLine | null {
    let text = '';
    let startRow: number | undefined;

    while (this.cursor < this.lines.length) {
      const reading = this.lines[this.cursor] ?? '';
      const row = this.cursor + 1;
      this.cursor += 1;

      if (COMMENT_REGEX.test(reading) || !CONTENT_REGEX.test(reading)) {
        continue;
      }

      if (startRow === undefined) {
        startRow = row;
      }
      text += reading;

      if (CONTINUATION_REGEX.test(text)) {
        text = text.replace(CONTINUATION_REGEX, '');
        continue;
      }

      const directive = text.match(TABSTOP_DIRECTIVE_REGEX);
      if (directive) {
        this.applyTabstop(Number(directive[1]), startRow, text);
        text = '';
        startRow = undefined;
        continue;
      }

      break;
    }

    if (startRow === undefined) {
      return null;
    }

    return {
      text,
      row: startRow,
      indent: expandTabs(leadingWhitespace(text), this.currentTabWidth),
    };
  }

  private applyTabstop(width: number, row: number, lineText: string): void {
    if (!Number.isInteger(width) || width < 1) {
      throw new ArchiveError(`Tab width must be at least 1, got ${width}`, {
        source: this.source,
        row,
        lineText,
      });
    }
    this.currentTabWidth = width;
  }
}
