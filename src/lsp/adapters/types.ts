export interface InitializeParams {
  processId: number | null;
  clientInfo: { name: string; version: string };
  rootUri: string;
  workspaceFolders: Array<{ uri: string; name: string }>;
  capabilities: Record<string, unknown>;
  initializationOptions?: unknown;
}

/**
 * Server-specific behavior layered over the generic LSP session: initialize
 * customization, per-method timeouts, and the notification that signals the
 * server has finished loading the workspace.
 */
export interface ServerAdapter {
  readonly name: string;
  customizeInitializeParams?(params: InitializeParams): InitializeParams;
  getTimeout?(method: string): number | undefined;
  /** True when the notification means the server is ready to answer queries. */
  isReadySignal?(method: string, params: unknown): boolean;
  /** Whether `isReadySignal` will ever fire for this server. */
  readonly announcesReadiness: boolean;
}
