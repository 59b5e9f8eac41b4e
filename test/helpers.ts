import pino from 'pino';
import { ArchiveReader, ArchiveReaderOptions, ReadResult } from '../src/index';

export const silentLogger = pino({ level: 'silent' });

export function createReader(options: ArchiveReaderOptions = {}): ArchiveReader {
  return new ArchiveReader({ logger: silentLogger, ...options });
}

export function read(content: string, options: ArchiveReaderOptions = {}): ReadResult {
  return createReader(options).fromString(content);
}
