import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { SupervisorError, errorMessage } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logger.js';
import type { PositionEncoding } from '../types.js';
import { pathToUri } from '../utils.js';
import type { InitializeParams, ServerAdapter } from './adapters/types.js';
import { Correlator, DEFAULT_REQUEST_TIMEOUT_MS } from './correlator.js';
import { Transport } from './transport.js';

export type SessionState = 'starting' | 'ready' | 'failed' | 'stopped';

/** The parts of `ChildProcess` the supervisor relies on. */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => ChildProcessLike;

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export type SessionNotificationListener = (
  session: AnalyzerSession,
  method: string,
  params: unknown
) => void;

const defaultSpawn: SpawnFn = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['pipe', 'pipe', 'pipe'] });

const CLIENT_CAPABILITIES: Record<string, unknown> = {
  general: { positionEncodings: ['utf-16'] },
  textDocument: {
    synchronization: { didOpen: true, didChange: true, didClose: true },
    definition: { linkSupport: true },
    references: { dynamicRegistration: false },
    hover: { contentFormat: ['markdown', 'plaintext'] },
    rename: { prepareSupport: true },
    documentSymbol: {
      symbolKind: { valueSet: Array.from({ length: 26 }, (_, i) => i + 1) },
      hierarchicalDocumentSymbolSupport: true,
    },
    codeAction: {
      codeActionLiteralSupport: {
        codeActionKind: { valueSet: ['', 'quickfix', 'refactor', 'refactor.extract', 'refactor.inline'] },
      },
      resolveSupport: { properties: ['edit'] },
      dataSupport: true,
    },
    publishDiagnostics: { relatedInformation: true, versionSupport: true },
    diagnostic: { dynamicRegistration: false, relatedDocumentSupport: false },
    typeHierarchy: { dynamicRegistration: false },
  },
  workspace: {
    workspaceEdit: { documentChanges: true },
    workspaceFolders: true,
    configuration: true,
    symbol: { symbolKind: { valueSet: Array.from({ length: 26 }, (_, i) => i + 1) } },
  },
  window: { workDoneProgress: true },
};

function parseEncoding(value: unknown): PositionEncoding | undefined {
  return value === 'utf-8' || value === 'utf-16' || value === 'utf-32' ? value : undefined;
}

/**
 * One lifetime of the analyzer process. Only the supervisor sees the process
 * handle; everything else talks to the session through `call` and `notify`.
 */
export class AnalyzerSession {
  state: SessionState = 'starting';
  capabilities: Record<string, unknown> = {};
  positionEncoding: PositionEncoding = 'utf-16';
  readonly startedAt = Date.now();
  /** Set once `initialized` went out, from then on the analyzer takes `shutdown`. */
  initialized = false;
  readonly exited: Promise<ExitInfo>;
  private exitInfo: ExitInfo | undefined;
  private readonly startAbort = new AbortController();

  constructor(
    readonly id: number,
    private readonly child: ChildProcessLike,
    readonly correlator: Correlator,
    private readonly adapter: ServerAdapter,
    private readonly defaultTimeoutMs: number
  ) {
    this.exited = new Promise((resolve) => {
      child.on('exit', (code, signal) => {
        this.exitInfo ??= { code, signal };
        resolve(this.exitInfo);
      });
      child.on('error', (error) => {
        this.exitInfo ??= { code: null, signal: null, error };
        resolve(this.exitInfo);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get hasExited(): boolean {
    return this.exitInfo !== undefined;
  }

  /** Aborted when the session is stopped, which ends any startup wait early. */
  get startSignal(): AbortSignal {
    return this.startAbort.signal;
  }

  abortStart(): void {
    this.startAbort.abort();
  }

  call<T = unknown>(method: string, params: unknown, timeoutMs?: number): Promise<T> {
    const timeout = timeoutMs ?? this.adapter.getTimeout?.(method) ?? this.defaultTimeoutMs;
    return this.correlator.call<T>(method, params, timeout);
  }

  notify(method: string, params: unknown): Promise<void> {
    return this.correlator.notify(method, params);
  }

  /** Resolves true if the process exits within `ms`. */
  waitForExit(ms: number): Promise<boolean> {
    if (this.exitInfo) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  kill(signal: NodeJS.Signals): void {
    if (!this.exitInfo) this.child.kill(signal);
  }
}

export interface SupervisorOptions {
  command: string;
  args?: string[];
  workspaceRoot: string;
  adapter: ServerAdapter;
  spawn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  requestTimeoutMs?: number;
  /** Upper bound on waiting for the adapter's readiness signal after `initialized`. */
  readyTimeoutMs?: number;
  shutdownGraceMs?: number;
  restartIntervalMinutes?: number;
  clientInfo?: { name: string; version: string };
}

/**
 * Owns the analyzer process: spawns it on demand, performs the LSP handshake,
 * notices when it dies, and replaces it on the next `ensureReady()`.
 */
export class ProcessSupervisor {
  private session: AnalyzerSession | undefined;
  private starting: Promise<AnalyzerSession> | undefined;
  private sessionCounter = 0;
  private shutdownCount = 0;
  private restartTimer: NodeJS.Timeout | undefined;
  private readonly listeners = new Set<SessionNotificationListener>();
  private readonly log: Logger;
  private readonly spawnProcess: SpawnFn;

  constructor(private readonly options: SupervisorOptions) {
    this.log = options.logger ?? defaultLogger;
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  get state(): SessionState | 'none' {
    if (this.starting) return 'starting';
    return this.session?.state ?? 'none';
  }

  get currentSession(): AnalyzerSession | undefined {
    return this.session;
  }

  onNotification(listener: SessionNotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Returns a ready session, starting one if needed. Callers arriving while a
   * start is in flight share that start instead of spawning again.
   */
  async ensureReady(): Promise<AnalyzerSession> {
    const current = this.session;
    if (current?.state === 'ready' && !current.correlator.isClosed) return current;
    if (this.starting) return this.starting;

    const start = this.startSession();
    this.starting = start;
    try {
      return await start;
    } finally {
      if (this.starting === start) this.starting = undefined;
    }
  }

  async restart(): Promise<AnalyzerSession> {
    this.log.info('supervisor', 'restarting analyzer');
    await this.shutdown();
    return this.ensureReady();
  }

  /** Graceful `shutdown`/`exit`, then SIGKILL once the grace period runs out. */
  async shutdown(): Promise<void> {
    this.clearRestartTimer();
    this.shutdownCount++;
    const starting = this.starting;
    const session = this.session;
    this.session = undefined;

    // A session that is still starting gets the same bounded stop as a ready one.
    if (session && session.state !== 'stopped') {
      await this.stopSession(session);
    }
    if (starting) {
      await starting.catch((error) => {
        this.log.debug('supervisor', `start abandoned during shutdown: ${errorMessage(error)}`);
      });
    }
  }

  private async startSession(): Promise<AnalyzerSession> {
    const generation = this.shutdownCount;
    const previous = this.session;
    if (previous && previous.state !== 'stopped') {
      await this.stopSession(previous);
    }
    if (generation !== this.shutdownCount) {
      throw new SupervisorError('handshake_failed', 'Analyzer start was cancelled by shutdown');
    }

    const { command, args = [], workspaceRoot } = this.options;
    const id = ++this.sessionCounter;
    this.log.info('supervisor', `starting session ${id}: ${[command, ...args].join(' ')}`);

    let child: ChildProcessLike;
    try {
      child = this.spawnProcess(command, args, {
        cwd: workspaceRoot,
        env: this.options.env ?? process.env,
      });
    } catch (error) {
      throw new SupervisorError('spawn_failed', `Failed to spawn ${command}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!child.stdin || !child.stdout) {
      child.kill('SIGKILL');
      throw new SupervisorError('spawn_failed', `${command} was spawned without piped stdio`);
    }

    child.stderr?.on('data', (data: Buffer) => {
      this.log.debug('rust-analyzer', data.toString().trimEnd());
    });

    // Writes to an analyzer that already exited fail with EPIPE on this stream.
    child.stdin.on('error', (error) => {
      this.log.debug('supervisor', `analyzer stdin error: ${error.message}`);
      this.failSession(session, `analyzer input closed: ${error.message}`);
    });

    const transport = new Transport(child.stdout, child.stdin, this.log);
    const rootUri = pathToUri(workspaceRoot);
    const correlator = new Correlator(transport, {
      logger: this.log,
      workspaceFolders: [{ uri: rootUri, name: 'workspace' }],
      // Losing the inbound stream, or a frame that cannot be decoded, ends the session.
      onClose: (reason) => this.failSession(session, reason),
    });
    const session = new AnalyzerSession(
      id,
      child,
      correlator,
      this.options.adapter,
      this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    );
    this.session = session;

    correlator.onNotification((method, params) => {
      for (const listener of this.listeners) listener(session, method, params);
    });
    void session.exited.then((info) => this.handleExit(session, info));
    correlator.start().catch((error) => {
      this.log.error('supervisor', `message loop crashed: ${errorMessage(error)}`);
    });

    try {
      await this.handshake(session, rootUri);
      if (session.startSignal.aborted) {
        throw new SupervisorError('handshake_failed', 'Analyzer was stopped before it became ready');
      }
    } catch (error) {
      this.failSession(session, errorMessage(error));
      if (error instanceof SupervisorError) throw error;
      throw new SupervisorError('handshake_failed', `Analyzer handshake failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    session.state = 'ready';
    this.log.info('supervisor', `session ${id} ready (pid ${session.pid ?? 'unknown'})`);
    this.scheduleRestart();
    return session;
  }

  private handshake(session: AnalyzerSession, rootUri: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: unknown) => {
        if (settled) return;
        settled = true;
        if (error === undefined) resolve();
        else reject(error);
      };

      void session.exited.then((info) => {
        const cause = info.error ? `: ${info.error.message}` : ` (code ${info.code ?? 'none'}, signal ${info.signal ?? 'none'})`;
        settle(
          new SupervisorError(
            info.error ? 'spawn_failed' : 'handshake_failed',
            `Analyzer exited during startup${cause}`,
            { cause: info.error }
          )
        );
      });

      this.initialize(session, rootUri).then(
        () => settle(),
        (error) => settle(error)
      );
    });
  }

  private async initialize(session: AnalyzerSession, rootUri: string): Promise<void> {
    const { adapter } = this.options;
    const params: InitializeParams = {
      processId: process.pid,
      clientInfo: this.options.clientInfo ?? { name: 'ra-mcp', version: '0.1.0' },
      rootUri,
      workspaceFolders: [{ uri: rootUri, name: 'workspace' }],
      capabilities: CLIENT_CAPABILITIES,
    };
    const finalParams = adapter.customizeInitializeParams?.(params) ?? params;

    // Subscribe before `initialize` so a fast server cannot announce readiness unseen.
    const readiness = adapter.announcesReadiness ? this.waitForReadySignal(session) : undefined;
    try {
      const result = await session.call<{ capabilities?: Record<string, unknown> } | null>(
        'initialize',
        finalParams
      );
      session.capabilities = result?.capabilities ?? {};
      session.positionEncoding = parseEncoding(session.capabilities.positionEncoding) ?? 'utf-16';
      await session.notify('initialized', {});
      session.initialized = true;

      if (readiness) {
        const ready = await readiness.promise;
        if (session.startSignal.aborted) {
          throw new SupervisorError('handshake_failed', 'Analyzer was stopped before it became ready');
        }
        if (!ready) {
          this.log.warn(
            'supervisor',
            `no readiness signal within ${this.options.readyTimeoutMs ?? 0}ms; continuing with a partially loaded workspace`
          );
        }
      }
    } finally {
      readiness?.cancel();
    }
  }

  private waitForReadySignal(session: AnalyzerSession): {
    promise: Promise<boolean>;
    cancel: () => void;
  } {
    const { adapter, readyTimeoutMs = 60000 } = this.options;
    let unsubscribe = () => {};
    let timer: NodeJS.Timeout | undefined;
    let onAbort = () => {};

    const promise = new Promise<boolean>((resolve) => {
      onAbort = () => resolve(false);
      if (session.startSignal.aborted) {
        resolve(false);
        return;
      }
      session.startSignal.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => resolve(false), readyTimeoutMs);
      unsubscribe = session.correlator.onNotification((method, params) => {
        if (adapter.isReadySignal?.(method, params)) {
          this.log.debug('supervisor', `readiness signal received (${method})`);
          resolve(true);
        }
      });
    });

    return {
      promise,
      cancel: () => {
        clearTimeout(timer);
        unsubscribe();
        session.startSignal.removeEventListener('abort', onAbort);
      },
    };
  }

  private handleExit(session: AnalyzerSession, info: ExitInfo): void {
    const detail = info.error
      ? info.error.message
      : `code ${info.code ?? 'none'}, signal ${info.signal ?? 'none'}`;

    if (session.state === 'stopped') {
      this.log.debug('supervisor', `session ${session.id} exited after stop (${detail})`);
    } else {
      this.log.warn('supervisor', `session ${session.id} exited unexpectedly (${detail})`);
      session.state = 'failed';
    }
    session.correlator.close(`analyzer exited (${detail})`);
    if (this.session === session) this.clearRestartTimer();
  }

  private failSession(session: AnalyzerSession, reason: string): void {
    if (session.state === 'stopped' || session.state === 'failed') return;
    this.log.error('supervisor', `session ${session.id} failed: ${reason}`);
    session.state = 'failed';
    session.correlator.close(reason);
    session.kill('SIGKILL');
  }

  private async stopSession(session: AnalyzerSession): Promise<void> {
    const graceMs = this.options.shutdownGraceMs ?? 3000;
    const acceptsShutdown = session.state === 'ready' || (session.state === 'starting' && session.initialized);
    session.state = 'stopped';
    session.abortStart();

    if (acceptsShutdown && !session.hasExited) {
      try {
        await session.call('shutdown', null, graceMs);
        await session.notify('exit', null);
      } catch (error) {
        this.log.debug('supervisor', `graceful shutdown failed: ${errorMessage(error)}`);
      }
    }

    if (!(await session.waitForExit(graceMs))) {
      this.log.warn('supervisor', `session ${session.id} ignored shutdown; killing`);
      session.kill('SIGKILL');
      await session.waitForExit(graceMs);
    }
    session.correlator.close('analyzer stopped');
  }

  private scheduleRestart(): void {
    const minutes = this.options.restartIntervalMinutes;
    if (!minutes || minutes <= 0) return;
    this.clearRestartTimer();
    this.restartTimer = setTimeout(
      () => {
        this.restart().catch((error) => {
          this.log.error('supervisor', `scheduled restart failed: ${errorMessage(error)}`);
        });
      },
      minutes * 60 * 1000
    );
    this.restartTimer.unref();
  }

  private clearRestartTimer(): void {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
  }
}
