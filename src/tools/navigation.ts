import { z } from 'zod';
import { CorrelatorError, ToolError, errorMessage } from '../errors.js';
import { compareLocations, formatLocation, location, range } from '../formatter.js';
import { describePosition } from '../position-resolver.js';
import {
  type OutlineEntry,
  flattenOutline,
  formatIdentity,
  identityFromDefinition,
  identityFromWorkspaceSymbol,
  innermostSymbolAt,
  symbolKindToString,
  symbolPathAt,
} from '../symbol-identity.js';
import { lineStarts } from '../text-position.js';
import type { Coordinate, FileLocation, Hover, MarkedString, MarkupContent, Range } from '../types.js';
import { uriToPath } from '../utils.js';
import { describeCoordinate, locatorParams, locatorProperties, outputFormat, resolveLocator } from './locator.js';
import { type ToolContext, defineTool, outputFormatProperty } from './registry.js';

export function formatHoverContents(contents: MarkupContent | MarkedString | MarkedString[]): string {
  if (typeof contents === 'string') return contents;

  if (Array.isArray(contents)) {
    return contents.map(formatHoverContents).join('\n\n');
  }

  if ('kind' in contents) {
    return contents.value;
  }

  return `\`\`\`${contents.language}\n${contents.value}\n\`\`\``;
}

async function notFound(ctx: ToolContext, coordinate: Coordinate, what: string): Promise<ToolError> {
  const text = await ctx.resolver.readText(coordinate.filePath);
  return new ToolError('not_found', `No ${what} at ${describeCoordinate(coordinate)}\n${describePosition(text, coordinate)}`);
}

interface DefinitionEntry extends FileLocation {
  symbol_path?: string;
  qualified_name?: string;
}

export const findDefinition = defineTool({
  name: 'find_definition',
  description:
    'Find where the symbol at a position is defined. Returns each definition location with its enclosing symbol path.',
  inputSchema: {
    type: 'object',
    properties: { ...locatorProperties, ...outputFormatProperty },
    required: ['file_path'],
  },
  params: z.object(locatorParams),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const locations = await ctx.client.definition(coordinate.filePath, coordinate.position);
    const warnings: string[] = [];
    const definitions: DefinitionEntry[] = [];

    for (const target of locations) {
      const entry: DefinitionEntry = location(target.uri, target.range);
      try {
        const symbols = await ctx.client.documentSymbols(entry.file);
        const path = symbolPathAt(symbols, target.range.start);
        const identity = identityFromDefinition(target.uri, path);
        if (path.length > 0) entry.symbol_path = path.map((segment) => segment.name).join('::');
        if (identity) entry.qualified_name = formatIdentity(identity);
      } catch (error) {
        if (error instanceof CorrelatorError && error.kind === 'session_closed') throw error;
        warnings.push(`Could not read the outline of ${entry.file}: ${errorMessage(error)}`);
      }
      definitions.push(entry);
    }

    return {
      data: { target: describeCoordinate(coordinate), definitions },
      warnings,
    };
  },
  render({ target, definitions }) {
    if (definitions.length === 0) return `No definition found for ${target}`;
    const lines = definitions.map((entry) =>
      entry.symbol_path ? `${formatLocation(entry)} (${entry.symbol_path})` : formatLocation(entry)
    );
    return `Definition of ${target}:\n${lines.join('\n')}`;
  },
});

export const findReferences = defineTool({
  name: 'find_references',
  description: 'Find every reference to the symbol at a position across the workspace.',
  inputSchema: {
    type: 'object',
    properties: {
      ...locatorProperties,
      include_declaration: {
        type: 'boolean',
        description: 'Whether to include the declaration itself',
        default: true,
      },
      ...outputFormatProperty,
    },
    required: ['file_path'],
  },
  params: z.object({ ...locatorParams, include_declaration: z.boolean().default(true) }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const found = await ctx.client.references(coordinate.filePath, coordinate.position, params.include_declaration);
    const references = found.map((entry) => location(entry.uri, entry.range)).sort(compareLocations);
    return { data: { target: describeCoordinate(coordinate), references } };
  },
  render({ target, references }) {
    if (references.length === 0) return `No references found for ${target}`;
    return `${references.length} reference(s) to ${target}:\n${references.map(formatLocation).join('\n')}`;
  },
});

export const getHover = defineTool({
  name: 'get_hover',
  description:
    'Show type information and documentation for the symbol at a position, including its declared signature.',
  inputSchema: {
    type: 'object',
    properties: { ...locatorProperties, ...outputFormatProperty },
    required: ['file_path'],
  },
  params: z.object(locatorParams),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const hover: Hover | null = await ctx.client.hover(coordinate.filePath, coordinate.position);
    const contents = hover ? formatHoverContents(hover.contents).trim() : '';
    if (!contents) throw await notFound(ctx, coordinate, 'hover information');
    return {
      data: {
        target: describeCoordinate(coordinate),
        contents,
        range: hover?.range ? range(hover.range) : undefined,
      },
    };
  },
  render({ contents }) {
    return contents;
  },
});

export const getSymbolSource = defineTool({
  name: 'get_symbol_source',
  description:
    'Return the full source text of the item (function, struct, impl, ...) defined by or referenced at a position.',
  inputSchema: {
    type: 'object',
    properties: { ...locatorProperties, ...outputFormatProperty },
    required: ['file_path'],
  },
  params: z.object(locatorParams),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const warnings: string[] = [];

    // A reference resolves to its definition; a definition (or a failed lookup) stays put.
    let target: Coordinate = coordinate;
    try {
      const [first] = await ctx.client.definition(coordinate.filePath, coordinate.position);
      if (first) target = { filePath: uriToPath(first.uri), position: first.range.start };
    } catch (error) {
      if (error instanceof CorrelatorError && error.kind === 'session_closed') throw error;
      warnings.push(`Definition lookup failed, using the given position: ${errorMessage(error)}`);
    }

    const symbols = await ctx.client.documentSymbols(target.filePath);
    const symbol = innermostSymbolAt(symbols, target.position);
    if (!symbol) throw await notFound(ctx, target, 'enclosing item');

    const text = await ctx.resolver.readText(target.filePath);
    const starts = lineStarts(text);
    const from = starts[symbol.range.start.line] ?? text.length;
    const toLine = starts[symbol.range.end.line + 1];
    const source = text.slice(from, toLine ?? text.length).replace(/\r?\n$|\r$/, '');
    const path = symbolPathAt(symbols, symbol.selectionRange.start);

    return {
      data: {
        file: target.filePath,
        range: range(symbol.range),
        symbol_path: path.map((segment) => segment.name).join('::'),
        kind: symbolKindToString(symbol.kind),
        source,
      },
      warnings,
    };
  },
  render(data) {
    const header = `${data.kind} ${data.symbol_path} at ${formatLocation(data)}`;
    return `${header}\n\n\`\`\`rust\n${data.source}\n\`\`\``;
  },
});

function outlineEntry(entry: OutlineEntry): OutlineEntry {
  return {
    name: entry.name,
    kind: entry.kind,
    detail: entry.detail,
    depth: entry.depth,
    container: entry.container,
    range: range(entry.range),
    selectionRange: range(entry.selectionRange),
  };
}

export const documentSymbols = defineTool({
  name: 'document_symbols',
  description:
    'List the outline of a file (modules, types, impls, functions, fields) in source order, with nesting depth.',
  inputSchema: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Absolute path to the Rust source file' },
      limit: { type: 'integer', description: 'Maximum number of entries to return', default: 200 },
      offset: { type: 'integer', description: 'Number of entries to skip', default: 0 },
      ...outputFormatProperty,
    },
    required: ['file_path'],
  },
  params: z.object({
    file_path: z.string().min(1),
    limit: z.number().int().positive().max(1000).default(200),
    offset: z.number().int().nonnegative().default(0),
    output_format: outputFormat,
  }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const outline = flattenOutline(await ctx.client.documentSymbols(params.file_path));
    const symbols = outline.slice(params.offset, params.offset + params.limit).map(outlineEntry);
    return {
      data: {
        file: params.file_path,
        total: outline.length,
        offset: params.offset,
        symbols,
        has_more: params.offset + symbols.length < outline.length,
      },
    };
  },
  render(data) {
    if (data.total === 0) return `No symbols in ${data.file}`;
    const lines = data.symbols.map(
      (entry) => `${'  '.repeat(entry.depth)}${entry.kind} ${entry.name} (line ${entry.selectionRange.start.line + 1})`
    );
    const shown = `${data.offset + 1}-${data.offset + data.symbols.length} of ${data.total}`;
    const more = data.has_more ? `\n(more available: offset=${data.offset + data.symbols.length})` : '';
    return `Symbols in ${data.file} (${shown}):\n${lines.join('\n')}${more}`;
  },
});

interface WorkspaceSymbolEntry {
  name: string;
  kind: string;
  file: string;
  range?: Range;
  container?: string;
  qualified_name: string;
  crate: string;
  module_path: string[];
  item_kind: string;
}

export const workspaceSymbols = defineTool({
  name: 'workspace_symbols',
  description:
    'Search symbols across the whole workspace by (fuzzy) name. Each hit carries its crate and module path.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Symbol name or fragment to search for' },
      limit: { type: 'integer', description: 'Maximum number of results', default: 50 },
      ...outputFormatProperty,
    },
    required: ['query'],
  },
  params: z.object({
    query: z.string().min(1),
    limit: z.number().int().positive().max(500).default(50),
    output_format: outputFormat,
  }),
  async execute(params, ctx) {
    const found = await ctx.client.workspaceSymbols(params.query);
    const symbols = found.slice(0, params.limit).map((symbol): WorkspaceSymbolEntry => {
      const identity = identityFromWorkspaceSymbol(symbol);
      return {
        name: symbol.name,
        kind: symbolKindToString(symbol.kind),
        file: uriToPath(symbol.location.uri),
        range: 'range' in symbol.location ? range(symbol.location.range) : undefined,
        container: symbol.containerName ?? undefined,
        qualified_name: formatIdentity(identity),
        crate: identity.crateName,
        module_path: identity.modulePath,
        item_kind: identity.kind,
      };
    });
    return { data: { query: params.query, total: found.length, symbols } };
  },
  render({ query, total, symbols }) {
    if (symbols.length === 0) return `No symbols matching "${query}"`;
    const lines = symbols.map((symbol) => {
      const where = symbol.range ? formatLocation({ file: symbol.file, range: symbol.range }) : symbol.file;
      return `${symbol.kind} ${symbol.qualified_name} - ${where}`;
    });
    const truncated = total > symbols.length ? ` (showing ${symbols.length} of ${total})` : '';
    return `Symbols matching "${query}"${truncated}:\n${lines.join('\n')}`;
  },
});

export const navigationTools = [
  findDefinition,
  findReferences,
  getHover,
  getSymbolSource,
  documentSymbols,
  workspaceSymbols,
];
