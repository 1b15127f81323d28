import { readFile, writeFile } from 'node:fs/promises';
import { ToolError, errorMessage } from './errors.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import { lineStarts, positionToOffset } from './text-position.js';
import type { PositionEncoding, TextEdit } from './types.js';
import { uriToPath } from './utils.js';

export interface FileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
}

export interface ApplyEditOptions {
  encoding?: PositionEncoding;
  /** Told about every modified file so the analyzer sees the new text. */
  client?: { syncFile(filePath: string): Promise<void> };
  fs?: FileSystem;
  logger?: Logger;
}

export interface ApplyEditResult {
  success: boolean;
  filesModified: string[];
  error?: string;
}

const nodeFs: FileSystem = {
  readFile: (filePath) => readFile(filePath, 'utf8'),
  writeFile: (filePath, content) => writeFile(filePath, content, 'utf8'),
};

/**
 * Applies LSP text edits to `text`. Edits are converted to offsets against the
 * original text and applied back to front; overlapping edits are rejected.
 */
export function applyTextEdits(text: string, edits: TextEdit[], encoding: PositionEncoding = 'utf-16'): string {
  const starts = lineStarts(text);
  const spans = edits
    .map((edit, index) => ({
      start: positionToOffset(text, edit.range.start, encoding, starts),
      end: positionToOffset(text, edit.range.end, encoding, starts),
      newText: edit.newText,
      index,
    }))
    .sort((a, b) => a.start - b.start || a.end - b.end || a.index - b.index);

  for (let i = 0; i < spans.length; i++) {
    const span = spans[i];
    const next = spans[i + 1];
    if (!span) continue;
    if (span.end < span.start) {
      throw new ToolError('edit_failed', `Edit ${span.index} has its end before its start`);
    }
    if (next && next.start < span.end) {
      throw new ToolError('edit_failed', `Edits ${span.index} and ${next.index} overlap`);
    }
  }

  let result = text;
  for (let i = spans.length - 1; i >= 0; i--) {
    const span = spans[i];
    if (!span) continue;
    result = result.slice(0, span.start) + span.newText + result.slice(span.end);
  }
  return result;
}

/**
 * Writes a `uri -> edits` change set to disk. All new contents are computed
 * before anything is written; a failed write restores the files already
 * written from their original text.
 */
export async function applyWorkspaceEdit(
  changes: Record<string, TextEdit[]>,
  options: ApplyEditOptions = {}
): Promise<ApplyEditResult> {
  const fs = options.fs ?? nodeFs;
  const log = options.logger ?? defaultLogger;
  const encoding = options.encoding ?? 'utf-16';
  const planned: Array<{ filePath: string; original: string; updated: string }> = [];

  try {
    for (const [uri, edits] of Object.entries(changes)) {
      if (edits.length === 0) continue;
      const filePath = uriToPath(uri);
      const original = await fs.readFile(filePath);
      planned.push({ filePath, original, updated: applyTextEdits(original, edits, encoding) });
    }
  } catch (error) {
    return { success: false, filesModified: [], error: errorMessage(error) };
  }

  const written: typeof planned = [];
  for (const file of planned) {
    try {
      await fs.writeFile(file.filePath, file.updated);
      written.push(file);
    } catch (error) {
      log.error('edit', `write to ${file.filePath} failed, rolling back ${written.length} file(s)`);
      for (const done of written.reverse()) {
        await fs.writeFile(done.filePath, done.original).catch((rollbackError) => {
          log.error('edit', `rollback of ${done.filePath} failed: ${errorMessage(rollbackError)}`);
        });
      }
      return { success: false, filesModified: [], error: `${file.filePath}: ${errorMessage(error)}` };
    }
  }

  for (const file of written) {
    await options.client?.syncFile(file.filePath);
  }

  return { success: true, filesModified: written.map((file) => file.filePath) };
}
