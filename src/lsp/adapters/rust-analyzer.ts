import type { InitializeParams, ServerAdapter } from './types.js';

interface ServerStatusParams {
  health?: 'ok' | 'warning' | 'error';
  quiescent?: boolean;
  message?: string;
}

function isServerStatus(value: unknown): value is ServerStatusParams {
  return typeof value === 'object' && value !== null && 'quiescent' in value;
}

/**
 * rust-analyzer reports workspace loading through the
 * `experimental/serverStatus` extension once the client opts in. Full analysis
 * mode also turns on build-script output dirs and proc-macro expansion, which
 * makes startup slower but hover/definition results complete.
 */
export class RustAnalyzerAdapter implements ServerAdapter {
  readonly name = 'rust-analyzer';
  readonly announcesReadiness = true;

  constructor(private readonly fullAnalysis: boolean) {}

  customizeInitializeParams(params: InitializeParams): InitializeParams {
    const current = params.capabilities.experimental;
    const experimental = typeof current === 'object' && current !== null ? current : {};

    return {
      ...params,
      capabilities: {
        ...params.capabilities,
        experimental: { ...experimental, serverStatusNotification: true },
      },
      initializationOptions: {
        cargo: { buildScripts: { enable: this.fullAnalysis } },
        procMacro: { enable: this.fullAnalysis },
        checkOnSave: false,
      },
    };
  }

  getTimeout(method: string): number | undefined {
    switch (method) {
      case 'workspace/symbol':
      case 'textDocument/references':
      case 'textDocument/rename':
        return 60000;
      case 'initialize':
        return this.fullAnalysis ? 120000 : 60000;
      default:
        return undefined;
    }
  }

  isReadySignal(method: string, params: unknown): boolean {
    return method === 'experimental/serverStatus' && isServerStatus(params) && params.quiescent === true;
  }
}
