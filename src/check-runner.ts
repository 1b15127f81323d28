import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import type { Readable } from 'node:stream';
import { CheckError, errorMessage } from './errors.js';
import { compareDiagnostics } from './formatter.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import { lineStarts, offsetToPosition, positionToOffset } from './text-position.js';
import type { Diagnostic, Position, Range, RelatedLocation, Severity } from './types.js';

export const DEFAULT_CHECK_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const MAX_STDERR_BYTES = 64 * 1024;

export type CheckCommand = 'check' | 'clippy';

export interface CheckProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type CheckSpawnFn = (
  command: string,
  args: string[],
  options: { cwd: string; detached: boolean }
) => CheckProcess;

export interface CheckRunnerOptions {
  cargoPath?: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  spawn?: CheckSpawnFn;
  /** Source text used to turn cargo's character columns into UTF-16 ones. */
  readFile?: (filePath: string) => Promise<string>;
  logger?: Logger;
}

export interface CheckRunOptions {
  command?: CheckCommand;
  extraArgs?: string[];
}

export interface CheckReport {
  command: CheckCommand;
  diagnostics: Diagnostic[];
  /** Output lines that were not JSON. */
  skippedLines: number;
  exitCode: number | null;
  /** From cargo's `build-finished` message, when it got that far. */
  success: boolean | undefined;
  stderr: string;
  durationMs: number;
}

interface CargoSpan {
  file_name: string;
  line_start: number;
  line_end: number;
  column_start: number;
  column_end: number;
  is_primary: boolean;
  label?: string | null;
}

interface CargoDiagnostic {
  message: string;
  level: string;
  code?: { code: string } | null;
  spans: CargoSpan[];
  children?: CargoDiagnostic[];
}

const defaultSpawn: CheckSpawnFn = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['ignore', 'pipe', 'pipe'] });

// cargo runs in a process group of its own so a kill reaches rustc and build scripts too.
const OWN_PROCESS_GROUP = process.platform !== 'win32';

function toSeverity(level: string): Severity {
  if (level.startsWith('error')) return 'error';
  if (level === 'warning') return 'warning';
  if (level === 'help') return 'hint';
  return 'info';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCargoDiagnostic(value: unknown): value is CargoDiagnostic {
  return (
    isObject(value) &&
    typeof value.message === 'string' &&
    typeof value.level === 'string' &&
    Array.isArray(value.spans)
  );
}

// Cargo reports 1-based lines and columns counted in characters (code points).
function spanRange(span: CargoSpan) {
  return {
    start: { line: span.line_start - 1, character: span.column_start - 1 },
    end: { line: span.line_end - 1, character: span.column_end - 1 },
  };
}

function toDiagnostic(message: CargoDiagnostic, workspacePath: string): Diagnostic | undefined {
  const primary = message.spans.find((span) => span.is_primary) ?? message.spans[0];
  if (!primary) return undefined;

  const file = (name: string) => (isAbsolute(name) ? name : resolve(workspacePath, name));
  const related: RelatedLocation[] = [];

  for (const span of message.spans) {
    if (span === primary || !span.label) continue;
    related.push({ file: file(span.file_name), range: spanRange(span), message: span.label });
  }
  for (const child of message.children ?? []) {
    const childSpan = child.spans.find((span) => span.is_primary) ?? child.spans[0];
    if (!childSpan) continue;
    related.push({
      file: file(childSpan.file_name),
      range: spanRange(childSpan),
      message: `${child.level}: ${child.message}`,
    });
  }

  return {
    severity: toSeverity(message.level),
    message: message.message,
    file: file(primary.file_name),
    range: spanRange(primary),
    code: message.code?.code ?? undefined,
    source: 'cargo',
    related,
  };
}

/**
 * Parses `--message-format=json` output. Non-JSON lines are counted, other
 * JSON messages ignored, and span-less compiler messages (the "aborting due
 * to" summaries) dropped. Duplicates across targets collapse into one.
 */
export function parseCargoOutput(
  output: string,
  workspacePath: string
): { diagnostics: Diagnostic[]; skippedLines: number; success: boolean | undefined } {
  const seen = new Map<string, Diagnostic>();
  let skippedLines = 0;
  let success: boolean | undefined;

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      skippedLines++;
      continue;
    }
    if (!isObject(parsed)) {
      skippedLines++;
      continue;
    }

    if (parsed.reason === 'build-finished' && typeof parsed.success === 'boolean') {
      success = parsed.success;
      continue;
    }
    if (parsed.reason !== 'compiler-message' || !isCargoDiagnostic(parsed.message)) continue;

    const diagnostic = toDiagnostic(parsed.message, workspacePath);
    if (!diagnostic) continue;
    const key = JSON.stringify(diagnostic);
    if (!seen.has(key)) seen.set(key, diagnostic);
  }

  return { diagnostics: [...seen.values()].sort(compareDiagnostics), skippedLines, success };
}

function rangeToUtf16(range: Range, text: string, starts: number[]): Range {
  const convert = (position: Position) =>
    offsetToPosition(text, positionToOffset(text, position, 'utf-32', starts), 'utf-16', starts);
  return { start: convert(range.start), end: convert(range.end) };
}

/**
 * Re-measures cargo's code point columns in UTF-16 code units, the unit the
 * analyzer's own diagnostics use. Files missing from `texts` keep their columns.
 */
export function cargoColumnsToUtf16(diagnostics: Diagnostic[], texts: Map<string, string>): Diagnostic[] {
  const starts = new Map<string, number[]>();
  const convert = (file: string, range: Range): Range => {
    const text = texts.get(file);
    if (text === undefined) return range;
    let fileStarts = starts.get(file);
    if (!fileStarts) {
      fileStarts = lineStarts(text);
      starts.set(file, fileStarts);
    }
    return rangeToUtf16(range, text, fileStarts);
  };

  return diagnostics.map((diagnostic) => ({
    ...diagnostic,
    range: convert(diagnostic.file, diagnostic.range),
    related: diagnostic.related.map((item) => ({ ...item, range: convert(item.file, item.range) })),
  }));
}

/**
 * Runs `cargo check`/`cargo clippy` under a wall-clock timeout and a cap on
 * captured stdout. Both bounds kill the process; what was captured before
 * that is still parsed and returned with the error.
 */
export class CheckRunner {
  readonly timeoutMs: number;
  readonly maxOutputBytes: number;
  private readonly cargoPath: string;
  private readonly spawnProcess: CheckSpawnFn;
  private readonly readSource: (filePath: string) => Promise<string>;
  private readonly log: Logger;

  constructor(options: CheckRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.cargoPath = options.cargoPath ?? 'cargo';
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.readSource = options.readFile ?? ((filePath) => readFile(filePath, 'utf8'));
    this.log = options.logger ?? defaultLogger;
  }

  async runCheck(workspacePath: string, options: CheckRunOptions = {}): Promise<CheckReport> {
    const command = options.command ?? 'check';
    const args = [command, '--message-format=json', ...(options.extraArgs ?? [])];
    const startedAt = Date.now();

    let child: CheckProcess;
    try {
      child = this.spawnProcess(this.cargoPath, args, { cwd: workspacePath, detached: OWN_PROCESS_GROUP });
    } catch (error) {
      throw new CheckError('spawn_failed', `Failed to start ${this.cargoPath}: ${errorMessage(error)}`, [], 0, {
        cause: error,
      });
    }

    this.log.debug('check', `running ${this.cargoPath} ${args.join(' ')} in ${workspacePath}`);
    const outcome = await this.capture(child);

    const stdout = Buffer.concat(outcome.stdout).toString('utf8');
    const parsed = parseCargoOutput(stdout, workspacePath);
    parsed.diagnostics = await this.normalizeColumns(parsed.diagnostics);
    const durationMs = Date.now() - startedAt;

    if (outcome.stopped === 'spawn_error') {
      throw new CheckError(
        'spawn_failed',
        `Failed to start ${this.cargoPath}: ${outcome.error?.message ?? 'unknown error'}`,
        [],
        0,
        { cause: outcome.error }
      );
    }
    if (outcome.stopped === 'timeout') {
      this.log.warn('check', `cargo ${command} killed after ${this.timeoutMs}ms`);
      throw new CheckError(
        'timeout',
        `cargo ${command} did not finish within ${this.timeoutMs}ms and was killed`,
        parsed.diagnostics,
        parsed.skippedLines
      );
    }
    if (outcome.stopped === 'truncated') {
      this.log.warn('check', `cargo ${command} output exceeded ${this.maxOutputBytes} bytes`);
      throw new CheckError(
        'output_truncated',
        `cargo ${command} produced more than ${this.maxOutputBytes} bytes of output; only the first ${this.maxOutputBytes} were parsed`,
        parsed.diagnostics,
        parsed.skippedLines
      );
    }

    return {
      command,
      diagnostics: parsed.diagnostics,
      skippedLines: parsed.skippedLines,
      exitCode: outcome.exitCode,
      success: parsed.success,
      stderr: Buffer.concat(outcome.stderr).toString('utf8'),
      durationMs,
    };
  }

  private async normalizeColumns(diagnostics: Diagnostic[]): Promise<Diagnostic[]> {
    const files = new Set<string>();
    for (const diagnostic of diagnostics) {
      files.add(diagnostic.file);
      for (const item of diagnostic.related) files.add(item.file);
    }

    const texts = new Map<string, string>();
    await Promise.all(
      [...files].map(async (file) => {
        try {
          texts.set(file, await this.readSource(file));
        } catch (error) {
          this.log.debug('check', `keeping cargo columns for ${file}: ${errorMessage(error)}`);
        }
      })
    );
    return cargoColumnsToUtf16(diagnostics, texts);
  }

  /** SIGKILL for cargo and everything it started. */
  private killTree(child: CheckProcess): void {
    if (OWN_PROCESS_GROUP && child.pid !== undefined) {
      try {
        process.kill(-child.pid, 'SIGKILL');
        return;
      } catch (error) {
        this.log.debug('check', `process group kill failed: ${errorMessage(error)}`);
      }
    }
    child.kill('SIGKILL');
  }

  private capture(child: CheckProcess): Promise<{
    stdout: Buffer[];
    stderr: Buffer[];
    exitCode: number | null;
    stopped?: 'timeout' | 'truncated' | 'spawn_error';
    error?: Error;
  }> {
    return new Promise((resolvePromise) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let stopped: 'timeout' | 'truncated' | undefined;
      let finished = false;

      const finish = (exitCode: number | null, extra: { stopped?: 'spawn_error'; error?: Error } = {}) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);
        resolvePromise({ stdout, stderr, exitCode, stopped: extra.stopped ?? stopped, error: extra.error });
      };

      const stop = (reason: 'timeout' | 'truncated') => {
        if (stopped) return;
        stopped = reason;
        this.killTree(child);
        // Descendants can hold the pipes open after the kill, so stop reading instead of waiting for `close`.
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish(null);
      };

      const timer = setTimeout(() => stop('timeout'), this.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => {
        if (stopped) return;
        const room = this.maxOutputBytes - stdoutBytes;
        if (chunk.length > room) {
          stdout.push(chunk.subarray(0, room));
          stdoutBytes += room;
          stop('truncated');
          return;
        }
        stdout.push(chunk);
        stdoutBytes += chunk.length;
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        const room = MAX_STDERR_BYTES - stderrBytes;
        if (room <= 0) return;
        const kept = chunk.subarray(0, room);
        stderr.push(kept);
        stderrBytes += kept.length;
      });

      child.on('error', (error) => finish(null, { stopped: 'spawn_error', error }));
      child.on('close', (code) => finish(code));
    });
  }
}
