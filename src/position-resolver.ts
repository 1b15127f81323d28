import { readFile } from 'node:fs/promises';
import { ResolveError, errorMessage } from './errors.js';
import { lineStarts, lineText, offsetToPosition } from './text-position.js';
import type { Coordinate, Locator, PositionEncoding, Range } from './types.js';

/**
 * What to do when the snippet text occurs more than once in the file:
 * `first` searches inside the first match, `unique` refuses to guess.
 */
export type SnippetPolicy = 'first' | 'unique';

export interface PositionResolverOptions {
  snippetPolicy?: SnippetPolicy;
  readFile?: (filePath: string) => Promise<string>;
}

const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;

function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && IDENTIFIER_CHAR.test(ch);
}

/** Whole-word occurrences of `symbol` in `text[from, to)`, as string offsets. */
export function findWordOccurrences(text: string, symbol: string, from = 0, to = text.length): number[] {
  const found: number[] = [];
  if (symbol.length === 0) return found;

  const wordStart = isIdentifierChar(charAt(symbol, 0));
  const wordEnd = isIdentifierChar(charBefore(symbol, symbol.length));

  let index = text.indexOf(symbol, from);
  while (index !== -1 && index + symbol.length <= to) {
    const end = index + symbol.length;
    const clearBefore = !wordStart || index === 0 || !isIdentifierChar(charBefore(text, index));
    const clearAfter = !wordEnd || end >= text.length || !isIdentifierChar(charAt(text, end));
    if (clearBefore && clearAfter) found.push(index);
    index = text.indexOf(symbol, index + 1);
  }
  return found;
}

// Whole code points, so astral letters count as identifier characters.
function charAt(text: string, index: number): string | undefined {
  const codePoint = text.codePointAt(index);
  return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
}

function charBefore(text: string, index: number): string | undefined {
  if (index <= 0) return undefined;
  const low = text.charCodeAt(index - 1);
  if (low >= 0xdc00 && low <= 0xdfff && index >= 2) return text.slice(index - 2, index);
  return text.slice(index - 1, index);
}

function findAll(text: string, needle: string): number[] {
  const found: number[] = [];
  let index = text.indexOf(needle);
  while (index !== -1) {
    found.push(index);
    index = text.indexOf(needle, index + 1);
  }
  return found;
}

/**
 * A caret line pointing at `character` under `line`, for error messages.
 * Tabs widen to four columns so the caret lines up in most viewers.
 */
export function positionMarker(line: string, character: number): string {
  let marker = '';
  let column = 0;
  for (const ch of line) {
    if (column === character) break;
    marker += ch === '\t' ? '    ' : ' ';
    column++;
  }
  while (column < character) {
    marker += ' ';
    column++;
  }
  return `${marker}^`;
}

export function describePosition(text: string, coordinate: Coordinate): string {
  const { line, character } = coordinate.position;
  const content = lineText(text, line);
  if (content === undefined) return `Line ${line + 1} is past the end of ${coordinate.filePath}`;
  return `Line ${line + 1}: '${content}'\n${' '.repeat(`Line ${line + 1}: '`.length)}${positionMarker(content, character)}`;
}

/**
 * Turns a Locator into the exact zero-based coordinate the analyzer expects.
 * Character columns are counted in the session's negotiated encoding.
 */
export class PositionResolver {
  private readonly policy: SnippetPolicy;
  private readonly read: (filePath: string) => Promise<string>;

  constructor(options: PositionResolverOptions = {}) {
    this.policy = options.snippetPolicy ?? 'first';
    this.read = options.readFile ?? ((filePath) => readFile(filePath, 'utf8'));
  }

  async resolve(locator: Locator, encoding: PositionEncoding = 'utf-16'): Promise<Coordinate> {
    if (locator.kind === 'exact') {
      const { line, character } = locator;
      if (!Number.isInteger(line) || !Number.isInteger(character) || line < 0 || character < 0) {
        throw new ResolveError(
          'invalid_position',
          `line and character must be non-negative integers, got ${line}:${character}`
        );
      }
      return { filePath: locator.filePath, position: { line, character } };
    }

    const { filePath, codeBlock, symbol, occurrence } = locator;
    if (!Number.isInteger(occurrence) || occurrence < 0) {
      throw new ResolveError('invalid_position', `occurrence must be a non-negative integer, got ${occurrence}`);
    }

    const text = await this.load(filePath);
    const blockStart = this.locateSnippet(text, codeBlock, filePath);
    const matches = findWordOccurrences(text, symbol, blockStart, blockStart + codeBlock.length);
    const offset = matches[occurrence];

    if (offset === undefined) {
      throw new ResolveError(
        'occurrence_out_of_range',
        matches.length === 0
          ? `Symbol '${symbol}' does not occur as a whole word in the code_block (requested occurrence ${occurrence})`
          : `Requested occurrence ${occurrence} of '${symbol}' but the code_block contains ${matches.length} (valid: 0..${matches.length - 1})`
      );
    }

    return { filePath, position: offsetToPosition(text, offset, encoding) };
  }

  /** Range covering the snippet, with surrounding whitespace trimmed off. */
  async resolveBlock(
    filePath: string,
    codeBlock: string,
    encoding: PositionEncoding = 'utf-16'
  ): Promise<{ filePath: string; range: Range }> {
    const text = await this.load(filePath);
    const start = this.locateSnippet(text, codeBlock, filePath);
    const leading = codeBlock.length - codeBlock.trimStart().length;
    const trailing = codeBlock.length - codeBlock.trimEnd().length;
    const starts = lineStarts(text);

    return {
      filePath,
      range: {
        start: offsetToPosition(text, start + leading, encoding, starts),
        end: offsetToPosition(text, start + codeBlock.length - trailing, encoding, starts),
      },
    };
  }

  async readText(filePath: string): Promise<string> {
    return this.load(filePath);
  }

  private async load(filePath: string): Promise<string> {
    try {
      return await this.read(filePath);
    } catch (error) {
      throw new ResolveError('file_unreadable', `Cannot read ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private locateSnippet(text: string, codeBlock: string, filePath: string): number {
    if (codeBlock.trim().length === 0) {
      throw new ResolveError('snippet_not_found', 'code_block is empty');
    }

    const matches = findAll(text, codeBlock);
    const first = matches[0];
    if (first === undefined) {
      throw new ResolveError(
        'snippet_not_found',
        `code_block not found in ${filePath}; it must match the file text exactly, including whitespace`
      );
    }
    if (matches.length > 1 && this.policy === 'unique') {
      const lines = matches.map((offset) => offsetToPosition(text, offset).line + 1);
      throw new ResolveError(
        'ambiguous_snippet',
        `code_block occurs ${matches.length} times in ${filePath} (lines ${lines.join(', ')}); include more context to make it unique`
      );
    }
    return first;
  }
}
