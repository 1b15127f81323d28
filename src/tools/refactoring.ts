import { z } from 'zod';
import { type RenameChanges, workspaceEditToChanges } from '../analyzer-client.js';
import { CorrelatorError, ToolError, ValidationError } from '../errors.js';
import { applyWorkspaceEdit } from '../file-editor.js';
import { range } from '../formatter.js';
import { scopeOf, symbolKindToString } from '../symbol-identity.js';
import type { CodeAction, Range } from '../types.js';
import { uriToPath } from '../utils.js';
import { describeCoordinate, locatorParams, locatorProperties, outputFormat, resolveLocator } from './locator.js';
import { type ToolContext, defineTool, outputFormatProperty } from './registry.js';

const RUST_IDENTIFIER = /^(r#)?[\p{L}_][\p{L}\p{N}_]*$/u;
// rust-analyzer's placeholder name for an extracted function.
const EXTRACTED_PLACEHOLDER = 'fun_name';
const UNVERIFIED_WARNING =
  'confidence: unverified. The transformation was produced by rust-analyzer but has not been compiled; run run_cargo_check to confirm it preserves behavior.';

interface FileEdits {
  file: string;
  edits: Array<{ range: Range; new_text: string }>;
}

function summarizeChanges(changes: RenameChanges): FileEdits[] {
  return Object.entries(changes)
    .map(([uri, edits]) => ({
      file: uriToPath(uri),
      edits: edits.map((edit) => ({ range: range(edit.range), new_text: edit.newText })),
    }))
    .sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
}

function countEdits(files: FileEdits[]): number {
  return files.reduce((total, file) => total + file.edits.length, 0);
}

function renderEdits(files: FileEdits[]): string {
  const lines: string[] = [];
  for (const file of files) {
    lines.push(`File: ${file.file}`);
    for (const edit of file.edits) {
      const { start, end } = edit.range;
      lines.push(
        `  - Line ${start.line + 1}, Column ${start.character + 1} to Line ${end.line + 1}, Column ${end.character + 1}: ${JSON.stringify(edit.new_text)}`
      );
    }
  }
  return lines.join('\n');
}

async function applyChanges(ctx: ToolContext, changes: RenameChanges): Promise<string[]> {
  const result = await applyWorkspaceEdit(changes, {
    encoding: await ctx.client.positionEncoding(),
    client: ctx.client,
    logger: ctx.logger,
  });
  if (!result.success) {
    throw new ToolError('edit_failed', `Failed to apply edits: ${result.error ?? 'unknown error'}`);
  }
  return result.filesModified;
}

export const renameSymbol = defineTool({
  name: 'rename_symbol',
  description:
    'Rename the symbol at a position everywhere it is used. Refuses when another item in the same scope already has the new name. Applies the edits unless dry_run is set.',
  inputSchema: {
    type: 'object',
    properties: {
      ...locatorProperties,
      new_name: { type: 'string', description: 'The new identifier' },
      dry_run: {
        type: 'boolean',
        description: 'Only report the edits, do not write them',
        default: false,
      },
      ...outputFormatProperty,
    },
    required: ['file_path', 'new_name'],
  },
  params: z.object({
    ...locatorParams,
    new_name: z.string().min(1),
    dry_run: z.boolean().default(false),
  }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const newName = params.new_name;
    if (!RUST_IDENTIFIER.test(newName) || newName === '_') {
      throw new ValidationError('invalid_params', `new_name "${newName}" is not a valid Rust identifier`);
    }

    const coordinate = await resolveLocator(ctx, params);
    const { filePath, position } = coordinate;
    const warnings: string[] = [];

    let renameRange: Range | null;
    try {
      renameRange = await ctx.client.prepareRename(filePath, position);
    } catch (error) {
      if (error instanceof CorrelatorError && error.kind === 'remote') {
        throw new ToolError('unsupported', `Cannot rename at ${describeCoordinate(coordinate)}: ${error.message}`);
      }
      throw error;
    }
    if (!renameRange) {
      throw new ToolError('not_found', `Nothing renameable at ${describeCoordinate(coordinate)}`);
    }

    // Check the scope of the declaration, which may be in another file.
    const [declaration] = await ctx.client.definition(filePath, position);
    const declFile = declaration ? uriToPath(declaration.uri) : filePath;
    const declPosition = declaration ? declaration.range.start : position;
    const scope = scopeOf(await ctx.client.documentSymbols(declFile), declPosition);
    if (scope) {
      const clash = scope.siblings.find((sibling) => sibling !== scope.symbol && sibling.name === newName);
      if (clash) {
        throw new ToolError(
          'rename_conflict',
          `Cannot rename ${scope.symbol.name} to ${newName}: ${symbolKindToString(clash.kind)} ${clash.name} already exists in the same scope (${declFile}:${clash.selectionRange.start.line + 1})`
        );
      }
      if (scope.symbol.name === newName) {
        throw new ValidationError('invalid_params', `${scope.symbol.name} is already named ${newName}`);
      }
    } else {
      warnings.push('The symbol is not an item in the file outline; only rust-analyzer checked for name conflicts.');
    }

    const changes = await ctx.client.rename(filePath, position, newName);
    const files = summarizeChanges(changes);
    if (files.length === 0) {
      throw new ToolError('not_found', `rust-analyzer returned no edits for renaming at ${describeCoordinate(coordinate)}`);
    }

    const filesModified = params.dry_run ? [] : await applyChanges(ctx, changes);
    return {
      data: {
        old_name: scope?.symbol.name,
        new_name: newName,
        applied: !params.dry_run,
        edit_count: countEdits(files),
        files,
        files_modified: filesModified,
      },
      warnings,
    };
  },
  render(data) {
    const subject = data.old_name ? `${data.old_name} to ${data.new_name}` : `symbol to ${data.new_name}`;
    if (!data.applied) {
      return `[DRY RUN] Would rename ${subject} (${data.edit_count} edit(s)):\n${renderEdits(data.files)}`;
    }
    return `Renamed ${subject}.\n\nModified files:\n${data.files_modified.map((file) => `- ${file}`).join('\n')}`;
  },
});

async function runCodeAction(
  ctx: ToolContext,
  filePath: string,
  actionRange: Range,
  kind: string,
  pick: (actions: CodeAction[]) => CodeAction | undefined,
  what: string
): Promise<{ action: CodeAction; changes: RenameChanges }> {
  const actions = await ctx.client.codeActions(filePath, actionRange, [kind]);
  const chosen = pick(actions.filter((action) => !action.disabled));
  if (!chosen) {
    const offered = actions.map((action) => action.title);
    throw new ToolError(
      'unsupported',
      `rust-analyzer offers no ${what} here${offered.length > 0 ? ` (available: ${offered.join(', ')})` : ''}`
    );
  }
  const resolved = await ctx.client.resolveCodeAction(filePath, chosen);
  if (!resolved.edit) {
    throw new ToolError('unsupported', `The "${chosen.title}" action carried no edit`);
  }
  return { action: resolved, changes: workspaceEditToChanges(resolved.edit) };
}

function renameExtracted(changes: RenameChanges, name: string): RenameChanges {
  const placeholder = new RegExp(`\\b${EXTRACTED_PLACEHOLDER}\\b`, 'g');
  const renamed: RenameChanges = {};
  for (const [uri, edits] of Object.entries(changes)) {
    renamed[uri] = edits.map((edit) => ({ ...edit, newText: edit.newText.replace(placeholder, name) }));
  }
  return renamed;
}

export const extractFunction = defineTool({
  name: 'extract_function',
  description:
    'Experimental: extract a block of statements or an expression into a new function. The result is marked unverified.',
  inputSchema: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Absolute path to the Rust source file' },
      code_block: {
        type: 'string',
        description: 'The exact code to extract, copied verbatim from the file',
      },
      function_name: {
        type: 'string',
        description: `Name for the new function (rust-analyzer uses "${EXTRACTED_PLACEHOLDER}" otherwise)`,
      },
      dry_run: { type: 'boolean', description: 'Only report the edits', default: false },
      ...outputFormatProperty,
    },
    required: ['file_path', 'code_block'],
  },
  params: z.object({
    file_path: z.string().min(1),
    code_block: z.string().min(1),
    function_name: z.string().regex(RUST_IDENTIFIER, 'must be a valid Rust identifier').optional(),
    dry_run: z.boolean().default(false),
    output_format: outputFormat,
  }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const encoding = await ctx.client.positionEncoding();
    const block = await ctx.resolver.resolveBlock(params.file_path, params.code_block, encoding);
    const { action, changes } = await runCodeAction(
      ctx,
      params.file_path,
      block.range,
      'refactor.extract',
      (actions) => actions.find((candidate) => /into function/i.test(candidate.title)),
      'function extraction'
    );

    const finalChanges = params.function_name ? renameExtracted(changes, params.function_name) : changes;
    const files = summarizeChanges(finalChanges);
    const filesModified = params.dry_run ? [] : await applyChanges(ctx, finalChanges);

    return {
      data: {
        confidence: 'unverified' as const,
        action: action.title,
        function_name: params.function_name ?? EXTRACTED_PLACEHOLDER,
        applied: !params.dry_run,
        files,
        files_modified: filesModified,
      },
      warnings: [UNVERIFIED_WARNING],
    };
  },
  render(data) {
    const verb = data.applied ? 'Applied' : '[DRY RUN] Would apply';
    return `${verb} "${data.action}" as ${data.function_name}:\n${renderEdits(data.files)}`;
  },
});

export const inlineFunction = defineTool({
  name: 'inline_function',
  description:
    'Experimental: inline the function call at a position (or, with all_callers, every call of the function). The result is marked unverified.',
  inputSchema: {
    type: 'object',
    properties: {
      ...locatorProperties,
      all_callers: {
        type: 'boolean',
        description: 'Inline into every caller and remove the function',
        default: false,
      },
      dry_run: { type: 'boolean', description: 'Only report the edits', default: false },
      ...outputFormatProperty,
    },
    required: ['file_path'],
  },
  params: z.object({
    ...locatorParams,
    all_callers: z.boolean().default(false),
    dry_run: z.boolean().default(false),
  }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const at: Range = { start: coordinate.position, end: coordinate.position };
    const { action, changes } = await runCodeAction(
      ctx,
      coordinate.filePath,
      at,
      'refactor.inline',
      (actions) => {
        const callers = (candidate: CodeAction) => /all callers/i.test(candidate.title);
        const inline = actions.filter((candidate) => /^inline/i.test(candidate.title));
        return params.all_callers ? inline.find(callers) : inline.find((candidate) => !callers(candidate));
      },
      params.all_callers ? 'inline-into-all-callers action' : 'inline action'
    );

    const files = summarizeChanges(changes);
    const filesModified = params.dry_run ? [] : await applyChanges(ctx, changes);

    return {
      data: {
        confidence: 'unverified' as const,
        action: action.title,
        applied: !params.dry_run,
        files,
        files_modified: filesModified,
      },
      warnings: [UNVERIFIED_WARNING],
    };
  },
  render(data) {
    const verb = data.applied ? 'Applied' : '[DRY RUN] Would apply';
    return `${verb} "${data.action}":\n${renderEdits(data.files)}`;
  },
});

export const refactoringTools = [renameSymbol, extractFunction, inlineFunction];
