import { readFile } from 'node:fs/promises';
import { CorrelatorError, errorMessage, isSessionLoss } from './errors.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import type { AnalyzerSession, ProcessSupervisor } from './lsp/supervisor.js';
import { offsetToPosition } from './text-position.js';
import type {
  CodeAction,
  DocumentDiagnosticReport,
  DocumentSymbol,
  Hover,
  LSPDiagnostic,
  Location,
  LocationLink,
  Position,
  PositionEncoding,
  Range,
  SymbolInformation,
  TextEdit,
  TypeHierarchyItem,
  WorkspaceEdit,
  WorkspaceSymbol,
} from './types.js';
import { delay, pathToUri } from './utils.js';

interface OpenDocument {
  version: number;
  text: string;
}

interface CachedDiagnostics {
  items: LSPDiagnostic[];
  version?: number;
  receivedAt: number;
}

/** Per-session bookkeeping; a fresh session starts with nothing open. */
interface SessionDocuments {
  open: Map<string, OpenDocument>;
  diagnostics: Map<string, CachedDiagnostics>;
  /** Tail of the sync chain per file. */
  syncing: Map<string, Promise<void>>;
}

export interface DiagnosticsWaitOptions {
  maxWaitTime?: number;
  idleTime?: number;
  checkInterval?: number;
}

export interface AnalyzerClientOptions {
  logger?: Logger;
  readFile?: (filePath: string) => Promise<string>;
  diagnosticsWait?: DiagnosticsWaitOptions;
}

export type RenameChanges = Record<string, TextEdit[]>;

function isLocationLink(value: Location | LocationLink): value is LocationLink {
  return 'targetUri' in value;
}

function isSymbolInformation(value: DocumentSymbol | SymbolInformation): value is SymbolInformation {
  return 'location' in value;
}

function isRange(value: unknown): value is Range {
  return typeof value === 'object' && value !== null && 'start' in value && 'end' in value;
}

function isCodeAction(value: unknown): value is CodeAction {
  // Bare `Command` items have a string `command` and nothing to apply.
  return (
    typeof value === 'object' &&
    value !== null &&
    'title' in value &&
    !('command' in value && typeof value.command === 'string')
  );
}

function isPublishDiagnostics(
  value: unknown
): value is { uri: string; diagnostics?: LSPDiagnostic[]; version?: number } {
  return typeof value === 'object' && value !== null && 'uri' in value && typeof value.uri === 'string';
}

/**
 * Typed rust-analyzer operations. Every call goes through the supervisor for a
 * ready session, syncs the file from disk first (edits happen outside the
 * analyzer), and is retried once on a fresh session if the old one died.
 */
export class AnalyzerClient {
  private readonly sessions = new WeakMap<AnalyzerSession, SessionDocuments>();
  private readonly log: Logger;
  private readonly read: (filePath: string) => Promise<string>;
  private readonly waitOptions: Required<DiagnosticsWaitOptions>;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    options: AnalyzerClientOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
    this.read = options.readFile ?? ((filePath) => readFile(filePath, 'utf8'));
    this.waitOptions = {
      maxWaitTime: 5000,
      idleTime: 300,
      checkInterval: 50,
      ...options.diagnosticsWait,
    };

    supervisor.onNotification((session, method, params) => {
      if (method === 'textDocument/publishDiagnostics' && isPublishDiagnostics(params)) {
        const items = params.diagnostics ?? [];
        this.log.debug(
          'client',
          `publishDiagnostics for ${params.uri}: ${items.length} item(s)${params.version !== undefined ? ` (version ${params.version})` : ''}`
        );
        this.documentsFor(session).diagnostics.set(params.uri, {
          items,
          version: params.version,
          receivedAt: Date.now(),
        });
      }
    });
  }

  async positionEncoding(): Promise<PositionEncoding> {
    return (await this.supervisor.ensureReady()).positionEncoding;
  }

  async restart(): Promise<AnalyzerSession> {
    return this.supervisor.restart();
  }

  /** Re-reads the file and pushes its content to the analyzer if it is open. */
  async syncFile(filePath: string): Promise<void> {
    const session = this.supervisor.currentSession;
    if (!session || session.state !== 'ready') return;
    if (!this.documentsFor(session).open.has(filePath)) return;
    try {
      await this.syncDocument(session, filePath);
    } catch (error) {
      // The next request re-syncs from disk anyway.
      this.log.debug('client', `sync of ${filePath} failed: ${errorMessage(error)}`);
    }
  }

  async definition(filePath: string, position: Position): Promise<Location[]> {
    const result = await this.request<Location | Array<Location | LocationLink> | null>(
      filePath,
      'textDocument/definition',
      { textDocument: { uri: pathToUri(filePath) }, position }
    );
    if (!result) return [];
    const items = Array.isArray(result) ? result : [result];
    return items.map((item) =>
      isLocationLink(item) ? { uri: item.targetUri, range: item.targetSelectionRange } : item
    );
  }

  async references(filePath: string, position: Position, includeDeclaration = true): Promise<Location[]> {
    const result = await this.request<Location[] | null>(filePath, 'textDocument/references', {
      textDocument: { uri: pathToUri(filePath) },
      position,
      context: { includeDeclaration },
    });
    return result ?? [];
  }

  async hover(filePath: string, position: Position): Promise<Hover | null> {
    return this.request<Hover | null>(filePath, 'textDocument/hover', {
      textDocument: { uri: pathToUri(filePath) },
      position,
    });
  }

  /** Hierarchical outline; flat `SymbolInformation` replies become childless nodes. */
  async documentSymbols(filePath: string): Promise<DocumentSymbol[]> {
    const result = await this.request<Array<DocumentSymbol | SymbolInformation> | null>(
      filePath,
      'textDocument/documentSymbol',
      { textDocument: { uri: pathToUri(filePath) } }
    );
    return (result ?? []).map((symbol) =>
      isSymbolInformation(symbol)
        ? {
            name: symbol.name,
            kind: symbol.kind,
            detail: symbol.containerName ?? undefined,
            range: symbol.location.range,
            selectionRange: symbol.location.range,
          }
        : symbol
    );
  }

  async workspaceSymbols(query: string): Promise<Array<SymbolInformation | WorkspaceSymbol>> {
    const result = await this.request<Array<SymbolInformation | WorkspaceSymbol> | null>(
      undefined,
      'workspace/symbol',
      { query }
    );
    return result ?? [];
  }

  /** Range of the renameable symbol, or null when nothing at the position can be renamed. */
  async prepareRename(filePath: string, position: Position): Promise<Range | null> {
    const result = await this.request<unknown>(filePath, 'textDocument/prepareRename', {
      textDocument: { uri: pathToUri(filePath) },
      position,
    });
    if (isRange(result)) return result;
    if (typeof result === 'object' && result !== null && 'range' in result && isRange(result.range)) {
      return result.range;
    }
    return null;
  }

  /** Rename edits grouped by file URI, with `documentChanges` folded into `changes`. */
  async rename(filePath: string, position: Position, newName: string): Promise<RenameChanges> {
    const edit = await this.request<WorkspaceEdit | null>(filePath, 'textDocument/rename', {
      textDocument: { uri: pathToUri(filePath) },
      position,
      newName,
    });
    return edit ? workspaceEditToChanges(edit) : {};
  }

  async codeActions(filePath: string, range: Range, only: string[]): Promise<CodeAction[]> {
    const result = await this.request<unknown[] | null>(filePath, 'textDocument/codeAction', {
      textDocument: { uri: pathToUri(filePath) },
      range,
      context: { diagnostics: [], only, triggerKind: 1 },
    });
    return (result ?? []).filter(isCodeAction);
  }

  async resolveCodeAction(filePath: string, action: CodeAction): Promise<CodeAction> {
    if (action.edit) return action;
    return this.request<CodeAction>(filePath, 'codeAction/resolve', action);
  }

  async prepareTypeHierarchy(filePath: string, position: Position): Promise<TypeHierarchyItem[]> {
    const result = await this.request<TypeHierarchyItem[] | null>(
      filePath,
      'textDocument/prepareTypeHierarchy',
      { textDocument: { uri: pathToUri(filePath) }, position }
    );
    return result ?? [];
  }

  async supertypes(filePath: string, item: TypeHierarchyItem): Promise<TypeHierarchyItem[]> {
    const result = await this.request<TypeHierarchyItem[] | null>(filePath, 'typeHierarchy/supertypes', {
      item,
    });
    return result ?? [];
  }

  async subtypes(filePath: string, item: TypeHierarchyItem): Promise<TypeHierarchyItem[]> {
    const result = await this.request<TypeHierarchyItem[] | null>(filePath, 'typeHierarchy/subtypes', {
      item,
    });
    return result ?? [];
  }

  /**
   * Diagnostics for one file. Pull diagnostics are preferred when the analyzer
   * offers them; otherwise the last `publishDiagnostics` is used, waiting for
   * the stream to go quiet if nothing has arrived yet.
   */
  async diagnostics(filePath: string): Promise<LSPDiagnostic[]> {
    return this.withSession(filePath, async (session) => {
      const uri = pathToUri(filePath);
      const documents = this.documentsFor(session);

      if (session.capabilities.diagnosticProvider) {
        try {
          const report = await session.call<DocumentDiagnosticReport | null>('textDocument/diagnostic', {
            textDocument: { uri },
          });
          if (report?.kind === 'full') return report.items;
          if (report?.kind === 'unchanged') return documents.diagnostics.get(uri)?.items ?? [];
        } catch (error) {
          if (!(error instanceof CorrelatorError) || error.kind !== 'remote') throw error;
          this.log.debug('client', `pull diagnostics failed, using published ones: ${error.message}`);
        }
      }

      const cached = documents.diagnostics.get(uri);
      if (cached) return cached.items;

      await this.waitForDiagnosticsIdle(documents, uri);
      return documents.diagnostics.get(uri)?.items ?? [];
    });
  }

  private request<T>(filePath: string | undefined, method: string, params: unknown): Promise<T> {
    return this.withSession(filePath, (session) => session.call<T>(method, params));
  }

  private async withSession<T>(
    filePath: string | undefined,
    operation: (session: AnalyzerSession) => Promise<T>
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const session = await this.supervisor.ensureReady();
      try {
        if (filePath) await this.syncDocument(session, filePath);
        return await operation(session);
      } catch (error) {
        if (attempt > 0 || !isSessionLoss(error)) throw error;
        this.log.warn('client', `analyzer session lost (${errorMessage(error)}); retrying on a new session`);
      }
    }
  }

  private documentsFor(session: AnalyzerSession): SessionDocuments {
    let documents = this.sessions.get(session);
    if (!documents) {
      documents = { open: new Map(), diagnostics: new Map(), syncing: new Map() };
      this.sessions.set(session, documents);
    }
    return documents;
  }

  /**
   * Opens the file, or sends its full new text when it changed on disk. Syncs
   * of one file run one at a time so it is opened once and versions never repeat.
   */
  private async syncDocument(session: AnalyzerSession, filePath: string): Promise<void> {
    const documents = this.documentsFor(session);
    const run = () => this.syncOnce(session, documents, filePath);
    const previous = documents.syncing.get(filePath);
    const next = previous ? previous.then(run, run) : run();
    documents.syncing.set(filePath, next);
    try {
      await next;
    } finally {
      if (documents.syncing.get(filePath) === next) documents.syncing.delete(filePath);
    }
  }

  private async syncOnce(session: AnalyzerSession, documents: SessionDocuments, filePath: string): Promise<void> {
    const uri = pathToUri(filePath);
    const text = await this.read(filePath);
    const current = documents.open.get(filePath);

    if (!current) {
      await session.notify('textDocument/didOpen', {
        textDocument: { uri, languageId: 'rust', version: 1, text },
      });
      documents.open.set(filePath, { version: 1, text });
      this.log.debug('client', `opened ${filePath}`);
      return;
    }

    if (current.text === text) return;

    const version = current.version + 1;
    const change =
      textDocumentSyncKind(session.capabilities) === 2
        ? {
            range: {
              start: { line: 0, character: 0 },
              end: offsetToPosition(current.text, current.text.length, session.positionEncoding),
            },
            text,
          }
        : { text };

    await session.notify('textDocument/didChange', {
      textDocument: { uri, version },
      contentChanges: [change],
    });
    documents.open.set(filePath, { version, text });
    // Whatever was published refers to the old text.
    documents.diagnostics.delete(uri);
    this.log.debug('client', `synced ${filePath} at version ${version}`);
  }

  private async waitForDiagnosticsIdle(documents: SessionDocuments, uri: string): Promise<void> {
    const { maxWaitTime, idleTime, checkInterval } = this.waitOptions;
    const startTime = Date.now();

    while (Date.now() - startTime < maxWaitTime) {
      await delay(checkInterval);
      const cached = documents.diagnostics.get(uri);
      if (cached && Date.now() - cached.receivedAt >= idleTime) return;
    }
    this.log.debug('client', `no diagnostics settled for ${uri} within ${maxWaitTime}ms`);
  }
}

function textDocumentSyncKind(capabilities: Record<string, unknown>): number | undefined {
  const sync = capabilities.textDocumentSync;
  if (typeof sync === 'number') return sync;
  if (typeof sync === 'object' && sync !== null && 'change' in sync && typeof sync.change === 'number') {
    return sync.change;
  }
  return undefined;
}

/** Folds both WorkspaceEdit shapes into `uri -> edits`; resource operations are ignored. */
export function workspaceEditToChanges(edit: WorkspaceEdit): RenameChanges {
  const changes: RenameChanges = {};
  for (const [uri, edits] of Object.entries(edit.changes ?? {})) {
    changes[uri] = [...(changes[uri] ?? []), ...edits];
  }
  for (const change of edit.documentChanges ?? []) {
    if ('textDocument' in change && 'edits' in change) {
      const { uri } = change.textDocument;
      changes[uri] = [...(changes[uri] ?? []), ...change.edits];
    }
  }
  return changes;
}
