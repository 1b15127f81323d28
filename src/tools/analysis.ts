import { z } from 'zod';
import { ToolError } from '../errors.js';
import { compareDiagnostics, diagnostic, formatDiagnosticLine, formatLocation, location } from '../formatter.js';
import { symbolKindToString } from '../symbol-identity.js';
import type { Diagnostic, LSPDiagnostic, Range, Severity, TypeHierarchyItem } from '../types.js';
import { describeCoordinate, locatorParams, locatorProperties, outputFormat, resolveLocator } from './locator.js';
import { defineTool, outputFormatProperty } from './registry.js';

const LSP_SEVERITY: Record<number, Severity> = { 1: 'error', 2: 'warning', 3: 'info', 4: 'hint' };

export function fromLspDiagnostic(filePath: string, item: LSPDiagnostic): Diagnostic {
  return diagnostic({
    severity: LSP_SEVERITY[item.severity ?? 1] ?? 'error',
    message: item.message,
    file: filePath,
    range: item.range,
    code: item.code === undefined ? undefined : String(item.code),
    source: item.source,
    related: (item.relatedInformation ?? []).map((info) => ({
      ...location(info.location.uri, info.location.range),
      message: info.message,
    })),
  });
}

export interface DiagnosticSummary {
  errors: number;
  warnings: number;
  info: number;
  hints: number;
}

export function summarize(diagnostics: Diagnostic[]): DiagnosticSummary {
  const summary: DiagnosticSummary = { errors: 0, warnings: 0, info: 0, hints: 0 };
  for (const item of diagnostics) {
    if (item.severity === 'error') summary.errors++;
    else if (item.severity === 'warning') summary.warnings++;
    else if (item.severity === 'info') summary.info++;
    else summary.hints++;
  }
  return summary;
}

export function formatSummary(summary: DiagnosticSummary): string {
  return `${summary.errors} error(s), ${summary.warnings} warning(s), ${summary.info} info, ${summary.hints} hint(s)`;
}

export const getDiagnostics = defineTool({
  name: 'get_diagnostics',
  description:
    "Get rust-analyzer's current diagnostics (errors, warnings, hints) for a file, sorted by position.",
  inputSchema: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Absolute path to the Rust source file' },
      ...outputFormatProperty,
    },
    required: ['file_path'],
  },
  params: z.object({ file_path: z.string().min(1), output_format: outputFormat }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const items = await ctx.client.diagnostics(params.file_path);
    const diagnostics = items.map((item) => fromLspDiagnostic(params.file_path, item)).sort(compareDiagnostics);
    return { data: { file: params.file_path, summary: summarize(diagnostics), diagnostics } };
  },
  render({ file, summary, diagnostics }) {
    if (diagnostics.length === 0) return `No diagnostics for ${file}`;
    return `${formatSummary(summary)} in ${file}:\n${diagnostics.map(formatDiagnosticLine).join('\n')}`;
  },
});

interface HierarchyEntry {
  name: string;
  kind: string;
  detail?: string;
  file: string;
  range: Range;
}

function hierarchyEntry(item: TypeHierarchyItem): HierarchyEntry {
  const { file, range } = location(item.uri, item.selectionRange);
  return { name: item.name, kind: symbolKindToString(item.kind), detail: item.detail, file, range };
}

function formatEntry(entry: HierarchyEntry): string {
  return `${entry.kind} ${entry.name} - ${formatLocation(entry)}`;
}

export const getTypeHierarchy = defineTool({
  name: 'get_type_hierarchy',
  description:
    'Show the supertypes (implemented traits, supertraits) and subtypes (implementors) of the type or trait at a position.',
  inputSchema: {
    type: 'object',
    properties: { ...locatorProperties, ...outputFormatProperty },
    required: ['file_path'],
  },
  params: z.object(locatorParams),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params, ctx) {
    const coordinate = await resolveLocator(ctx, params);
    const [item] = await ctx.client.prepareTypeHierarchy(coordinate.filePath, coordinate.position);
    if (!item) {
      throw new ToolError('not_found', `No type or trait at ${describeCoordinate(coordinate)}`);
    }

    const [supertypes, subtypes] = await Promise.all([
      ctx.client.supertypes(coordinate.filePath, item),
      ctx.client.subtypes(coordinate.filePath, item),
    ]);
    return {
      data: {
        item: hierarchyEntry(item),
        supertypes: supertypes.map(hierarchyEntry),
        subtypes: subtypes.map(hierarchyEntry),
      },
    };
  },
  render({ item, supertypes, subtypes }) {
    const section = (title: string, entries: HierarchyEntry[]) =>
      entries.length === 0 ? `${title}: none` : `${title}:\n${entries.map((e) => `  ${formatEntry(e)}`).join('\n')}`;
    return [formatEntry(item), section('Supertypes', supertypes), section('Subtypes', subtypes)].join('\n\n');
  },
});

export const analysisTools = [getDiagnostics, getTypeHierarchy];
