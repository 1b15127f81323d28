import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { fakeCheckSpawner } from '../test/fake-process.js';
import { CheckError } from './errors.js';
import { CheckRunner, cargoColumnsToUtf16, parseCargoOutput } from './check-runner.js';
import { silentLogger } from './logger.js';

const WORKSPACE = '/work/demo';

function compilerMessage(message: Record<string, unknown>): string {
  return JSON.stringify({ reason: 'compiler-message', package_id: 'demo 0.1.0', message });
}

const UNUSED_VARIABLE = compilerMessage({
  message: 'unused variable: `x`',
  level: 'warning',
  code: { code: 'unused_variables' },
  spans: [
    {
      file_name: 'src/main.rs',
      line_start: 3,
      line_end: 3,
      column_start: 9,
      column_end: 10,
      is_primary: true,
      label: null,
    },
  ],
  children: [
    {
      message: 'if this is intentional, prefix it with an underscore: `_x`',
      level: 'help',
      spans: [
        {
          file_name: 'src/main.rs',
          line_start: 3,
          line_end: 3,
          column_start: 9,
          column_end: 10,
          is_primary: true,
        },
      ],
    },
  ],
});

const MISMATCHED_TYPES = compilerMessage({
  message: 'mismatched types',
  level: 'error',
  code: { code: 'E0308' },
  spans: [
    {
      file_name: 'src/lib.rs',
      line_start: 10,
      line_end: 10,
      column_start: 5,
      column_end: 7,
      is_primary: true,
      label: 'expected `u32`, found `&str`',
    },
    {
      file_name: 'src/lib.rs',
      line_start: 8,
      line_end: 8,
      column_start: 20,
      column_end: 23,
      is_primary: false,
      label: 'expected `u32` because of return type',
    },
  ],
});

const ABORTING = compilerMessage({
  message: 'aborting due to 1 previous error',
  level: 'error',
  spans: [],
});

describe('parseCargoOutput', () => {
  it('turns compiler messages into sorted, zero-based diagnostics', () => {
    const output = [
      JSON.stringify({ reason: 'compiler-artifact', package_id: 'dep 1.0.0' }),
      UNUSED_VARIABLE,
      MISMATCHED_TYPES,
      ABORTING,
      JSON.stringify({ reason: 'build-finished', success: false }),
    ].join('\n');

    const parsed = parseCargoOutput(output, WORKSPACE);

    expect(parsed.success).toBe(false);
    expect(parsed.skippedLines).toBe(0);
    expect(parsed.diagnostics).toEqual([
      {
        severity: 'error',
        message: 'mismatched types',
        file: '/work/demo/src/lib.rs',
        range: { start: { line: 9, character: 4 }, end: { line: 9, character: 6 } },
        code: 'E0308',
        source: 'cargo',
        related: [
          {
            file: '/work/demo/src/lib.rs',
            range: { start: { line: 7, character: 19 }, end: { line: 7, character: 22 } },
            message: 'expected `u32` because of return type',
          },
        ],
      },
      {
        severity: 'warning',
        message: 'unused variable: `x`',
        file: '/work/demo/src/main.rs',
        range: { start: { line: 2, character: 8 }, end: { line: 2, character: 9 } },
        code: 'unused_variables',
        source: 'cargo',
        related: [
          {
            file: '/work/demo/src/main.rs',
            range: { start: { line: 2, character: 8 }, end: { line: 2, character: 9 } },
            message: 'help: if this is intentional, prefix it with an underscore: `_x`',
          },
        ],
      },
    ]);
  });

  it('counts lines that are not JSON objects and keeps going', () => {
    const output = ['   Compiling demo v0.1.0', UNUSED_VARIABLE, '{"truncated', '42', ''].join('\n');
    const parsed = parseCargoOutput(output, WORKSPACE);

    expect(parsed.skippedLines).toBe(3);
    expect(parsed.diagnostics).toHaveLength(1);
    expect(parsed.success).toBeUndefined();
  });

  it('collapses the same diagnostic reported for several targets', () => {
    const parsed = parseCargoOutput([UNUSED_VARIABLE, UNUSED_VARIABLE].join('\n'), WORKSPACE);
    expect(parsed.diagnostics).toHaveLength(1);
  });

  it('keeps absolute file names as they are', () => {
    const absolute = compilerMessage({
      message: 'unused import',
      level: 'warning',
      spans: [
        {
          file_name: '/home/dev/.cargo/registry/src/dep/lib.rs',
          line_start: 1,
          line_end: 1,
          column_start: 1,
          column_end: 4,
          is_primary: true,
        },
      ],
    });
    const [first] = parseCargoOutput(absolute, WORKSPACE).diagnostics;
    expect(first?.file).toBe('/home/dev/.cargo/registry/src/dep/lib.rs');
  });
});

describe('CheckRunner', () => {
  it('runs cargo with JSON output in the workspace and reports the result', async () => {
    const fake = fakeCheckSpawner({
      stdout: [UNUSED_VARIABLE, JSON.stringify({ reason: 'build-finished', success: true })],
      stderr: '    Checking demo v0.1.0\n',
    });
    const runner = new CheckRunner({ spawn: fake.spawn, logger: silentLogger });

    const report = await runner.runCheck(WORKSPACE, { command: 'clippy', extraArgs: ['--all-targets'] });

    expect(fake.calls).toEqual([
      { command: 'cargo', args: ['clippy', '--message-format=json', '--all-targets'], cwd: WORKSPACE },
    ]);
    expect(report.command).toBe('clippy');
    expect(report.success).toBe(true);
    expect(report.exitCode).toBe(0);
    expect(report.skippedLines).toBe(0);
    expect(report.stderr).toBe('    Checking demo v0.1.0\n');
    expect(report.diagnostics.map((item) => item.code)).toEqual(['unused_variables']);
  });

  it('kills a run that outlives the timeout and keeps what it parsed', async () => {
    const fake = fakeCheckSpawner({ stdout: [UNUSED_VARIABLE], hang: true });
    const runner = new CheckRunner({ spawn: fake.spawn, timeoutMs: 50, logger: silentLogger });

    const startedAt = Date.now();
    const error = await runner.runCheck(WORKSPACE).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(CheckError);
    expect(error).toMatchObject({
      kind: 'timeout',
      message: 'cargo check did not finish within 50ms and was killed',
    });
    if (error instanceof CheckError) {
      expect(error.diagnostics.map((item) => item.message)).toEqual(['unused variable: `x`']);
    }
    expect(fake.spawned[0]?.killSignals).toEqual(['SIGKILL']);
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('does not wait forever for a killed process that never closes', async () => {
    const fake = fakeCheckSpawner({ hang: true, unkillable: true });
    const runner = new CheckRunner({ spawn: fake.spawn, timeoutMs: 20, logger: silentLogger });

    await expect(runner.runCheck(WORKSPACE)).rejects.toMatchObject({ kind: 'timeout' });
  });

  it('truncates at the output cap and parses exactly the retained prefix', async () => {
    const second = MISMATCHED_TYPES;
    const fake = fakeCheckSpawner({ stdout: [UNUSED_VARIABLE, second, UNUSED_VARIABLE], hang: true });
    const cap = Buffer.byteLength(`${UNUSED_VARIABLE}\n`) + 40;
    const runner = new CheckRunner({ spawn: fake.spawn, maxOutputBytes: cap, logger: silentLogger });

    const error = await runner.runCheck(WORKSPACE).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(CheckError);
    if (error instanceof CheckError) {
      expect(error.kind).toBe('output_truncated');
      expect(error.diagnostics.map((item) => item.message)).toEqual(['unused variable: `x`']);
      // The cut-off second line is the only unparseable one.
      expect(error.skippedLines).toBe(1);
    }
    expect(fake.spawned[0]?.killSignals).toEqual(['SIGKILL']);
  });

  it('reports a missing cargo as spawn_failed', async () => {
    const fake = fakeCheckSpawner({ spawnError: new Error('spawn cargo ENOENT') });
    const runner = new CheckRunner({ spawn: fake.spawn, logger: silentLogger });

    await expect(runner.runCheck(WORKSPACE)).rejects.toMatchObject({
      kind: 'spawn_failed',
      message: 'Failed to start cargo: spawn cargo ENOENT',
    });
  });

  it('reports columns in UTF-16 units when the line has astral characters', async () => {
    const source = 'fn main() {\n    let crab = "\u{1F980}"; let x = 1;\n}\n';
    const fake = fakeCheckSpawner({
      stdout: [
        compilerMessage({
          message: 'unused variable: `x`',
          level: 'warning',
          spans: [
            { file_name: 'src/main.rs', line_start: 2, line_end: 2, column_start: 25, column_end: 26, is_primary: true },
          ],
        }),
      ],
    });
    const runner = new CheckRunner({
      spawn: fake.spawn,
      logger: silentLogger,
      readFile: async (filePath) => {
        if (filePath !== '/work/demo/src/main.rs') throw new Error(`ENOENT: ${filePath}`);
        return source;
      },
    });

    const report = await runner.runCheck(WORKSPACE);

    expect(report.diagnostics[0]?.range).toEqual({
      start: { line: 1, character: 25 },
      end: { line: 1, character: 26 },
    });
  });

  it.skipIf(process.platform === 'win32')('kills everything cargo started once the timeout fires', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'ra-mcp-check-'));
    // `sh check ...` runs this script in place of cargo; the nested shell outlives a plain kill of its parent.
    writeFileSync(join(dir, 'check'), "sh -c 'sleep 1; touch marker'\n");
    const runner = new CheckRunner({ cargoPath: 'sh', timeoutMs: 300, logger: silentLogger });

    try {
      const startedAt = Date.now();
      const error = await runner.runCheck(dir).catch((reason: unknown) => reason);
      const elapsed = Date.now() - startedAt;

      expect(error).toMatchObject({ kind: 'timeout', message: 'cargo check did not finish within 300ms and was killed' });
      expect(elapsed).toBeLessThan(1000);
      await new Promise((resolve) => setTimeout(resolve, 1200));
      expect(existsSync(join(dir, 'marker'))).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('cargoColumnsToUtf16', () => {
  it('leaves diagnostics of unread files as they are', () => {
    const diagnostic = {
      severity: 'error' as const,
      message: 'mismatched types',
      file: '/work/demo/src/lib.rs',
      range: { start: { line: 0, character: 4 }, end: { line: 0, character: 6 } },
      related: [],
    };
    expect(cargoColumnsToUtf16([diagnostic], new Map())).toEqual([diagnostic]);
  });

  it('converts related locations against their own file', () => {
    const diagnostic = {
      severity: 'warning' as const,
      message: 'unused import',
      file: '/work/demo/src/lib.rs',
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 3 } },
      related: [
        {
          file: '/work/demo/src/emoji.rs',
          range: { start: { line: 0, character: 2 }, end: { line: 0, character: 3 } },
          message: 'defined here',
        },
      ],
    };
    const texts = new Map([['/work/demo/src/emoji.rs', '\u{1F600}\u{1F600}x\n']]);

    const [converted] = cargoColumnsToUtf16([diagnostic], texts);

    expect(converted?.range).toEqual(diagnostic.range);
    expect(converted?.related[0]?.range).toEqual({ start: { line: 0, character: 4 }, end: { line: 0, character: 5 } });
  });
});
