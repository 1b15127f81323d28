import type {
  Diagnostic,
  FileLocation,
  OutputMode,
  Position,
  Range,
  RelatedLocation,
  Severity,
  ToolResult,
} from './types.js';
import { uriToPath } from './utils.js';

// Payload builders. Each one creates its object with a fixed key order so JSON
// output does not depend on how the analyzer happened to order its fields.

export function position(value: Position): Position {
  return { line: value.line, character: value.character };
}

export function range(value: Range): Range {
  return { start: position(value.start), end: position(value.end) };
}

export function location(uriOrPath: string, value: Range): FileLocation {
  return { file: uriToPath(uriOrPath), range: range(value) };
}

function related(value: RelatedLocation): RelatedLocation {
  return { file: value.file, range: range(value.range), message: value.message };
}

export function diagnostic(value: Diagnostic): Diagnostic {
  return {
    severity: value.severity,
    message: value.message,
    file: value.file,
    range: range(value.range),
    code: value.code,
    source: value.source,
    related: value.related.map(related),
  };
}

const SEVERITY_RANK: Record<Severity, number> = { error: 0, warning: 1, info: 2, hint: 3 };

// Code unit order, independent of the host locale.
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Orders by file, line, column, severity, then message. */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareText(a.file, b.file) ||
    a.range.start.line - b.range.start.line ||
    a.range.start.character - b.range.start.character ||
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareText(a.message, b.message)
  );
}

export function compareLocations(a: FileLocation, b: FileLocation): number {
  return (
    compareText(a.file, b.file) ||
    a.range.start.line - b.range.start.line ||
    a.range.start.character - b.range.start.character
  );
}

/** `path:line:col`, one-based for people. */
export function formatLocation(value: FileLocation): string {
  return `${value.file}:${value.range.start.line + 1}:${value.range.start.character + 1}`;
}

export function formatDiagnosticLine(value: Diagnostic): string {
  const code = value.code ? `[${value.code}] ` : '';
  const lines = [`${formatLocation(value)} ${value.severity}: ${code}${value.message}`];
  for (const note of value.related) {
    lines.push(`    ${formatLocation(note)} ${note.message}`);
  }
  return lines.join('\n');
}

function envelope<T>(result: ToolResult<T>): Record<string, unknown> {
  if (result.ok) {
    return { ok: true, tool: result.tool, data: result.data, warnings: result.warnings };
  }
  const { kind, message, partial } = result.error;
  return { ok: false, tool: result.tool, error: { kind, message, partial } };
}

/**
 * Renders a tool result. JSON mode is the envelope itself; text mode uses the
 * tool's renderer, with warnings first and failures as `Error [kind]: message`.
 */
export function formatToolResult<T>(
  result: ToolResult<T>,
  mode: OutputMode,
  render: (data: T) => string = (data) => JSON.stringify(data, null, 2)
): string {
  if (mode === 'json') {
    return JSON.stringify(envelope(result), null, 2);
  }

  if (!result.ok) {
    const { kind, message, partial } = result.error;
    const text = `Error [${kind}]: ${message}`;
    return partial === undefined ? text : `${text}\n\nPartial result:\n${JSON.stringify(partial, null, 2)}`;
  }

  const body = render(result.data);
  if (result.warnings.length === 0) return body;
  return [...result.warnings.map((warning) => `Warning: ${warning}`), '', body].join('\n');
}

export function toCallToolResult<T>(
  result: ToolResult<T>,
  text: string
): { content: Array<{ type: 'text'; text: string }>; isError: boolean } {
  return { content: [{ type: 'text', text }], isError: !result.ok };
}
