import { describe, expect, it } from 'vitest';
import { lineCount, lineStarts, lineText, measure, offsetToPosition, positionToOffset } from './text-position.js';

describe('lineStarts', () => {
  it('treats \\n, \\r\\n and a lone \\r as line ends', () => {
    expect(lineStarts('a\nb\r\nc\rd')).toEqual([0, 2, 5, 7]);
  });

  it('counts a trailing newline as starting an empty last line', () => {
    expect(lineCount('fn main() {}\n')).toBe(2);
  });
});

describe('measure', () => {
  it('counts the same text differently per encoding', () => {
    const text = 'aé😀';
    expect(measure(text, 'utf-16')).toBe(4);
    expect(measure(text, 'utf-8')).toBe(7);
    expect(measure(text, 'utf-32')).toBe(3);
  });
});

describe('offsetToPosition / positionToOffset', () => {
  const text = 'let s = "😀";\n    s.len()\r\n';

  it('maps an offset after an astral character per encoding', () => {
    const offset = text.indexOf('"', 9);
    expect(offsetToPosition(text, offset, 'utf-16')).toEqual({ line: 0, character: 11 });
    expect(offsetToPosition(text, offset, 'utf-8')).toEqual({ line: 0, character: 13 });
    expect(offsetToPosition(text, offset, 'utf-32')).toEqual({ line: 0, character: 10 });
  });

  it('round-trips positions on later lines', () => {
    const offset = text.indexOf('len');
    for (const encoding of ['utf-8', 'utf-16', 'utf-32'] as const) {
      const position = offsetToPosition(text, offset, encoding);
      expect(position).toEqual({ line: 1, character: 6 });
      expect(positionToOffset(text, position, encoding)).toBe(offset);
    }
  });

  it('clamps a character past the line end to the line end', () => {
    expect(positionToOffset(text, { line: 1, character: 80 })).toBe(text.indexOf('\r\n'));
  });

  it('clamps a line past the end to the end of the text', () => {
    expect(positionToOffset(text, { line: 9, character: 0 })).toBe(text.length);
  });
});

describe('lineText', () => {
  it('returns a line without its terminator', () => {
    expect(lineText('one\r\ntwo\nthree', 0)).toBe('one');
    expect(lineText('one\r\ntwo\nthree', 2)).toBe('three');
    expect(lineText('one', 3)).toBeUndefined();
  });
});
