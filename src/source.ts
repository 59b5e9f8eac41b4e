/**
 * Acquisition of raw archive lines from files, buffers, arrays and streams.
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { Readable } from 'stream';
import { ArchiveError } from './errors';

export interface RawSource {
  /** Label used in diagnostics, e.g. `file friends.txt`. */
  label: string;
  lines: string[];
}

export function splitContentIntoLines(content: string): string[] {
  if (!content) {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Arrays of lines may still carry their terminators; each entry is split
 * so that one element is one physical line.
 */
export function normalizeLines(lines: readonly string[]): string[] {
  const result: string[] = [];
  for (const line of lines) {
    const parts = line.split(/\r?\n/);
    if (parts.length > 1 && parts[parts.length - 1] === '') {
      parts.pop();
    }
    result.push(...parts);
  }
  return result;
}

export function readSourceFile(filePath: string): RawSource {
  const label = `file ${filePath}`;
  let descriptor: number;
  try {
    descriptor = fs.openSync(filePath, 'r');
  } catch (error) {
    throw new ArchiveError(`Cannot read archive from ${filePath}: ${describe(error)}`, { source: label });
  }

  try {
    if (!fs.fstatSync(descriptor).isFile()) {
      throw new ArchiveError(`Can only read an archive from a regular file: ${filePath}`, { source: label });
    }
    const content = fs.readFileSync(descriptor, 'utf-8');
    return { label, lines: splitContentIntoLines(content) };
  } catch (error) {
    if (error instanceof ArchiveError) {
      throw error;
    }
    throw new ArchiveError(`Cannot read archive from ${filePath}: ${describe(error)}`, { source: label });
  } finally {
    fs.closeSync(descriptor);
  }
}

export async function readSourceStream(stream: Readable, label = 'stream'): Promise<RawSource> {
  const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const lines: string[] = [];
  try {
    for await (const line of reader) {
      lines.push(line);
    }
  } catch (error) {
    throw new ArchiveError(`Cannot read archive from ${label}: ${describe(error)}`, { source: label });
  } finally {
    reader.close();
  }
  return { label, lines };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
