/**
 * Reader configuration and its validation
 */

import { z } from 'zod';
import { ArchiveError } from './errors';
import { DEFAULT_TAB_WIDTH } from './lexer';
import type { Logger } from './logger';
import { RecordKind } from './types';

export const DEFAULT_MAX_DEPTH = 64;

const recordKindSchema = z.custom<RecordKind>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'tag' in value &&
    typeof value.tag === 'string' &&
    'construct' in value &&
    typeof value.construct === 'function',
  { message: 'Expected a record kind with a tag and a construct function' },
);

const loggerSchema = z.custom<Logger>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'debug' in value &&
    typeof value.debug === 'function',
  { message: 'Expected a pino logger' },
);

const keywordListSchema = z.union([z.string().min(1), z.array(z.string().min(1))]);

export const readerOptionsSchema = z.object({
  name: z.string().min(1).default('archive'),
  tabstop: z.number().int().min(1).default(DEFAULT_TAB_WIDTH),
  only: keywordListSchema.optional(),
  abbreviations: z
    .union([z.record(recordKindSchema), z.array(z.tuple([z.string().min(1), recordKindSchema]))])
    .optional(),
  maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
  from: z.union([z.string().min(1), z.array(z.string()), z.instanceof(Buffer)]).optional(),
  logger: loggerSchema.optional(),
});

export const readOptionsSchema = z.object({
  tabstop: z.number().int().min(1).optional(),
  source: z.string().min(1).optional(),
});

export type ArchiveReaderOptions = z.input<typeof readerOptionsSchema>;
export type ResolvedReaderOptions = z.output<typeof readerOptionsSchema>;
export type ReadOptions = z.input<typeof readOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseReaderOptions(options: unknown): ResolvedReaderOptions {
  const result = readerOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new ArchiveError(`Invalid archive reader options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseReadOptions(options: unknown): z.output<typeof readOptionsSchema> {
  const result = readOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new ArchiveError(`Invalid read options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** `only` as a list of keywords; empty when unrestricted. */
export function onlyKeywords(only: string | string[] | undefined): string[] {
  if (only === undefined) {
    return [];
  }
  return typeof only === 'string' ? [only] : only;
}

export function abbreviationEntries(
  abbreviations: ResolvedReaderOptions['abbreviations'],
): Array<readonly [string, RecordKind]> {
  if (abbreviations === undefined) {
    return [];
  }
  return Array.isArray(abbreviations) ? abbreviations : Object.entries(abbreviations);
}
