import { describe, expect, it } from 'vitest';
import {
  compareDiagnostics,
  diagnostic,
  formatDiagnosticLine,
  formatLocation,
  formatToolResult,
  location,
  toCallToolResult,
} from './formatter.js';
import type { Diagnostic, ToolResult } from './types.js';

function makeDiagnostic(overrides: Partial<Diagnostic>): Diagnostic {
  return {
    severity: 'warning',
    message: 'unused variable',
    file: '/work/demo/src/lib.rs',
    range: { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
    related: [],
    ...overrides,
  };
}

describe('payload builders', () => {
  it('emit keys in a fixed order whatever order they came in', () => {
    const shuffled: Diagnostic = {
      related: [],
      source: 'rust-analyzer',
      range: { end: { character: 4, line: 2 }, start: { character: 1, line: 2 } },
      file: '/a.rs',
      message: 'm',
      severity: 'error',
      code: 'E0425',
    };
    expect(JSON.stringify(diagnostic(shuffled))).toBe(
      '{"severity":"error","message":"m","file":"/a.rs","range":{"start":{"line":2,"character":1},"end":{"line":2,"character":4}},"code":"E0425","source":"rust-analyzer","related":[]}'
    );
  });

  it('converts file URIs to paths', () => {
    const range = { start: { line: 1, character: 2 }, end: { line: 1, character: 5 } };
    expect(location('file:///work/demo/src/main.rs', range)).toEqual({ file: '/work/demo/src/main.rs', range });
  });
});

describe('compareDiagnostics', () => {
  it('orders by file, position, severity, then message', () => {
    const b = makeDiagnostic({ file: '/b.rs' });
    const aLate = makeDiagnostic({ file: '/a.rs', range: { start: { line: 5, character: 0 }, end: { line: 5, character: 1 } } });
    const aWarning = makeDiagnostic({ file: '/a.rs', severity: 'warning', message: 'z' });
    const aError = makeDiagnostic({ file: '/a.rs', severity: 'error', message: 'y' });
    const aErrorX = makeDiagnostic({ file: '/a.rs', severity: 'error', message: 'x' });

    expect([b, aLate, aWarning, aError, aErrorX].sort(compareDiagnostics)).toEqual([aErrorX, aError, aWarning, aLate, b]);
  });

  it('compares by code unit, not by locale', () => {
    const upper = makeDiagnostic({ file: '/Z.rs' });
    const lower = makeDiagnostic({ file: '/a.rs' });
    expect([lower, upper].sort(compareDiagnostics)).toEqual([upper, lower]);
  });
});

describe('text rendering', () => {
  it('formats locations one-based', () => {
    expect(
      formatLocation({ file: '/x.rs', range: { start: { line: 0, character: 4 }, end: { line: 0, character: 6 } } })
    ).toBe('/x.rs:1:5');
  });

  it('formats a diagnostic with its code and related notes', () => {
    const item = makeDiagnostic({
      severity: 'error',
      message: 'mismatched types',
      code: 'E0308',
      related: [
        {
          file: '/work/demo/src/lib.rs',
          range: { start: { line: 7, character: 19 }, end: { line: 7, character: 22 } },
          message: 'expected due to this',
        },
      ],
    });
    expect(formatDiagnosticLine(item)).toBe(
      '/work/demo/src/lib.rs:1:1 error: [E0308] mismatched types\n    /work/demo/src/lib.rs:8:20 expected due to this'
    );
  });
});

describe('formatToolResult', () => {
  const success: ToolResult<{ count: number }> = {
    ok: true,
    tool: 'find_references',
    data: { count: 2 },
    warnings: ['index is still loading'],
  };
  const failure: ToolResult<{ count: number }> = {
    ok: false,
    tool: 'run_cargo_check',
    error: { kind: 'timeout', message: 'too slow', partial: { diagnostics: [] } },
  };

  it('renders the JSON envelope', () => {
    expect(JSON.parse(formatToolResult(success, 'json'))).toEqual({
      ok: true,
      tool: 'find_references',
      data: { count: 2 },
      warnings: ['index is still loading'],
    });
    expect(JSON.parse(formatToolResult(failure, 'json'))).toEqual({
      ok: false,
      tool: 'run_cargo_check',
      error: { kind: 'timeout', message: 'too slow', partial: { diagnostics: [] } },
    });
  });

  it('renders text with warnings ahead of the body', () => {
    expect(formatToolResult(success, 'text', (data) => `${data.count} reference(s)`)).toBe(
      'Warning: index is still loading\n\n2 reference(s)'
    );
  });

  it('renders failures with their kind and any partial result', () => {
    expect(formatToolResult(failure, 'text')).toBe(
      'Error [timeout]: too slow\n\nPartial result:\n{\n  "diagnostics": []\n}'
    );
  });

  it('is byte-identical for identical input', () => {
    expect(formatToolResult(success, 'json')).toBe(formatToolResult({ ...success }, 'json'));
  });

  it('marks failures as MCP errors', () => {
    expect(toCallToolResult(failure, 'x')).toEqual({ content: [{ type: 'text', text: 'x' }], isError: true });
    expect(toCallToolResult(success, 'y').isError).toBe(false);
  });
});
