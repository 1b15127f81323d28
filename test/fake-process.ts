import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { CheckProcess, CheckSpawnFn } from '../src/check-runner.js';

export interface FakeCheckOptions {
  /** Lines written to stdout, each followed by a newline. */
  stdout?: string[];
  stderr?: string;
  exitCode?: number;
  /** Keep running until killed. */
  hang?: boolean;
  /** Ignore SIGKILL and never emit `close`. */
  unkillable?: boolean;
  /** Emit `error` instead of running, like a missing executable. */
  spawnError?: Error;
}

/** A cargo lookalike that replays canned output. */
export class FakeCheckProcess extends EventEmitter implements CheckProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  private closed = false;

  constructor(private readonly options: FakeCheckOptions = {}) {
    super();
    setImmediate(() => this.run());
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    if (!this.options.unkillable) this.close(null);
    return true;
  }

  private run(): void {
    if (this.options.spawnError) {
      this.emit('error', this.options.spawnError);
      return;
    }
    for (const line of this.options.stdout ?? []) {
      if (this.closed) return;
      this.stdout.write(`${line}\n`);
    }
    if (this.options.stderr) this.stderr.write(this.options.stderr);
    if (!this.options.hang) {
      // Let the stream listeners see every chunk before `close`.
      setImmediate(() => this.close(this.options.exitCode ?? 0));
    }
  }

  private close(code: number | null): void {
    if (this.closed) return;
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, code === null ? 'SIGKILL' : null));
  }
}

export function fakeCheckSpawner(options: FakeCheckOptions = {}): {
  spawn: CheckSpawnFn;
  spawned: FakeCheckProcess[];
  calls: Array<{ command: string; args: string[]; cwd: string }>;
} {
  const spawned: FakeCheckProcess[] = [];
  const calls: Array<{ command: string; args: string[]; cwd: string }> = [];
  const spawn: CheckSpawnFn = (command, args, { cwd }) => {
    calls.push({ command, args, cwd });
    const child = new FakeCheckProcess(options);
    spawned.push(child);
    return child;
  };
  return { spawn, spawned, calls };
}
