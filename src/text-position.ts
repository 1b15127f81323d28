import type { Position, PositionEncoding } from './types.js';

/**
 * String offsets (UTF-16 code units) at which each line begins. `\r\n`, `\r`
 * and `\n` all end a line, matching what the analyzer counts.
 */
export function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === 0x0d) {
      if (text.charCodeAt(i + 1) === 0x0a) i++;
      starts.push(i + 1);
    } else if (code === 0x0a) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/** Length of `segment` in the units of `encoding`. */
export function measure(segment: string, encoding: PositionEncoding): number {
  switch (encoding) {
    case 'utf-8':
      return Buffer.byteLength(segment, 'utf8');
    case 'utf-32': {
      let count = 0;
      for (const _ of segment) count++;
      return count;
    }
    default:
      return segment.length;
  }
}

function lineIndexFor(starts: number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) low = mid;
    else high = mid - 1;
  }
  return low;
}

/** End of the line's content, before its terminator. */
function lineContentEnd(text: string, starts: number[], line: number): number {
  const next = starts[line + 1];
  if (next === undefined) return text.length;
  let end = next;
  if (text.charCodeAt(end - 1) === 0x0a) end--;
  if (text.charCodeAt(end - 1) === 0x0d) end--;
  return end;
}

export function offsetToPosition(
  text: string,
  offset: number,
  encoding: PositionEncoding = 'utf-16',
  starts: number[] = lineStarts(text)
): Position {
  const clamped = Math.max(0, Math.min(offset, text.length));
  const line = lineIndexFor(starts, clamped);
  const lineStart = starts[line] ?? 0;
  return { line, character: measure(text.slice(lineStart, clamped), encoding) };
}

/**
 * Inverse of `offsetToPosition`. Characters past the end of a line clamp to
 * the line end and lines past the end of the text clamp to the text end.
 */
export function positionToOffset(
  text: string,
  position: Position,
  encoding: PositionEncoding = 'utf-16',
  starts: number[] = lineStarts(text)
): number {
  const lineStart = starts[position.line];
  if (lineStart === undefined) return text.length;
  const end = lineContentEnd(text, starts, position.line);

  if (encoding === 'utf-16') {
    return Math.min(lineStart + position.character, end);
  }

  let units = 0;
  let offset = lineStart;
  while (offset < end && units < position.character) {
    const codePoint = text.codePointAt(offset) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    units += encoding === 'utf-8' ? Buffer.byteLength(text.slice(offset, offset + width), 'utf8') : 1;
    offset += width;
  }
  return offset;
}

export function lineCount(text: string): number {
  return lineStarts(text).length;
}

/** Text of one line without its terminator, or undefined past the end. */
export function lineText(text: string, line: number, starts: number[] = lineStarts(text)): string | undefined {
  const start = starts[line];
  if (start === undefined) return undefined;
  return text.slice(start, lineContentEnd(text, starts, line));
}
