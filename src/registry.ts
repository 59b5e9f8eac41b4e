/**
 * Keyword -> record kind table consulted by the block parser.
 *
 * Keywords are matched exactly: no case folding, no trimming.
 */

import { DEFAULT_ABBREVIATIONS } from './kinds';
import { RecordKind } from './types';

export class AbbreviationRegistry {
  private readonly kinds = new Map<string, RecordKind>();

  constructor(entries: Iterable<readonly [string, RecordKind]> = []) {
    for (const [keyword, kind] of entries) {
      this.register(keyword, kind);
    }
  }

  /** A registry holding the five built-in keywords. */
  static withDefaults(): AbbreviationRegistry {
    return new AbbreviationRegistry(DEFAULT_ABBREVIATIONS);
  }

  resolve(keyword: string): RecordKind | undefined {
    return this.kinds.get(keyword);
  }

  /**
   * Adds or overrides `keyword`. Registering `undefined` removes it and
   * returns what was removed.
   */
  register(keyword: string, kind: RecordKind | undefined): RecordKind | undefined {
    if (kind === undefined) {
      return this.unregister(keyword);
    }
    this.kinds.set(keyword, kind);
    return kind;
  }

  unregister(keyword: string): RecordKind | undefined {
    const previous = this.kinds.get(keyword);
    this.kinds.delete(keyword);
    return previous;
  }

  has(keyword: string): boolean {
    return this.kinds.has(keyword);
  }

  entries(): Array<[string, RecordKind]> {
    return [...this.kinds.entries()];
  }

  listKeywords(): string[] {
    return [...this.kinds.keys()].sort();
  }
}
