import { ArchiveError, LineReader, expandTabs, leadingWhitespace } from '../src/index';

function readAll(lines: string[], tabWidth?: number): Array<{ text: string; row: number; indent: number }> {
  const reader = new LineReader(lines, { source: 'test', tabWidth });
  const result: Array<{ text: string; row: number; indent: number }> = [];
  let line = reader.peek();
  while (line) {
    result.push(line);
    reader.advance();
    line = reader.peek();
  }
  return result;
}

describe('expandTabs', () => {
  test('should count spaces as one column each', () => {
    for (const width of [1, 2, 4, 8]) {
      expect(expandTabs('', width)).toBe(0);
      expect(expandTabs('      ', width)).toBe(6);
    }
  });

  test('should move a tab to the next tab stop', () => {
    for (const width of [1, 3, 4, 8]) {
      expect(expandTabs('\t', width)).toBe(width);
      expect(expandTabs('\t\t', width)).toBe(2 * width);
    }
  });

  test('should advance a full stop when already on one', () => {
    expect(expandTabs('  \t', 2)).toBe(4);
    expect(expandTabs('    \t', 4)).toBe(8);
  });

  test('should mix tabs and spaces', () => {
    expect(expandTabs('  \t', 8)).toBe(8);
    expect(expandTabs(' \t ', 4)).toBe(5);
    expect(expandTabs('\t   \t', 4)).toBe(8);
  });

  test('should stop leading whitespace at the first visible character', () => {
    expect(leadingWhitespace(' \t user x')).toBe(' \t ');
    expect(leadingWhitespace('user')).toBe('');
  });
});

describe('LineReader', () => {
  test('should drop comments and blank lines', () => {
    const lines = readAll(['# heading', '', 'user markov', '   ', '  # indented comment', '  email home']);

    expect(lines).toEqual([
      { text: 'user markov', row: 3, indent: 0 },
      { text: '  email home', row: 6, indent: 2 },
    ]);
  });

  test('should keep a hash which is not the first visible character', () => {
    const lines = readAll(['  location #mind_the_hash']);

    expect(lines).toEqual([{ text: '  location #mind_the_hash', row: 1, indent: 2 }]);
  });

  test('should not consume a line on peek', () => {
    const reader = new LineReader(['a', 'b'], { source: 'test' });

    expect(reader.peek()?.text).toBe('a');
    expect(reader.peek()?.text).toBe('a');
    reader.advance();
    expect(reader.peek()?.text).toBe('b');
    reader.advance();
    expect(reader.peek()).toBeNull();
  });

  test('should join continued lines without the backslash', () => {
    const lines = readAll(['  field value part1 \\', 'value part2', 'next']);

    expect(lines).toEqual([
      { text: '  field value part1 value part2', row: 1, indent: 2 },
      { text: 'next', row: 3, indent: 0 },
    ]);
  });

  test('should allow whitespace after the continuation backslash', () => {
    const lines = readAll(['a \\   ', 'b \\', 'c']);

    expect(lines).toEqual([{ text: 'a b c', row: 1, indent: 0 }]);
  });

  test('should skip comments inside a continuation', () => {
    const lines = readAll(['a \\', '# not here', '', 'b']);

    expect(lines).toEqual([{ text: 'a b', row: 1, indent: 0 }]);
  });

  test('should return a continued line which runs into the end of input', () => {
    const lines = readAll(['field a \\']);

    expect(lines).toEqual([{ text: 'field a ', row: 1, indent: 0 }]);
  });

  test('should use a tab width of 8 by default', () => {
    const reader = new LineReader(['\tx'], { source: 'test' });

    expect(reader.tabWidth).toBe(8);
    expect(reader.peek()?.indent).toBe(8);
  });

  test('should apply a tabstop directive to later lines only', () => {
    const reader = new LineReader(['\tbefore', 'tabstop = 4', '\tafter'], { source: 'test' });

    expect(reader.peek()).toEqual({ text: '\tbefore', row: 1, indent: 8 });
    reader.advance();
    expect(reader.peek()).toEqual({ text: '\tafter', row: 3, indent: 4 });
    expect(reader.tabWidth).toBe(4);
  });

  test('should accept a tabstop directive without spaces and with indentation', () => {
    const lines = readAll(['   tabstop=2', '\tx'], 8);

    expect(lines).toEqual([{ text: '\tx', row: 2, indent: 2 }]);
  });

  test('should reject a zero tab width', () => {
    const reader = new LineReader(['x', 'tabstop = 0', 'y'], { source: 'test' });
    reader.advance();

    expect(() => reader.peek()).toThrow(ArchiveError);
    expect(() => new LineReader(['tabstop = 0'], { source: 'test' }).peek()).toThrow(
      'test:1 - Tab width must be at least 1, got 0',
    );
  });
});
