import { describe, expect, it } from 'vitest';
import { RustAnalyzerAdapter } from './rust-analyzer.js';
import type { InitializeParams } from './types.js';

const BASE: InitializeParams = {
  processId: 1,
  clientInfo: { name: 'ra-mcp', version: '0.1.0' },
  rootUri: 'file:///work/demo',
  workspaceFolders: [{ uri: 'file:///work/demo', name: 'demo' }],
  capabilities: { experimental: { snippetTextEdit: false } },
};

describe('RustAnalyzerAdapter', () => {
  it('opts into server status and keeps existing experimental capabilities', () => {
    const params = new RustAnalyzerAdapter(false).customizeInitializeParams(BASE);
    expect(params.capabilities.experimental).toEqual({ snippetTextEdit: false, serverStatusNotification: true });
    expect(params.initializationOptions).toEqual({
      cargo: { buildScripts: { enable: false } },
      procMacro: { enable: false },
      checkOnSave: false,
    });
  });

  it('treats only a quiescent server status as ready', () => {
    const adapter = new RustAnalyzerAdapter(true);
    expect(adapter.isReadySignal('experimental/serverStatus', { health: 'ok', quiescent: true })).toBe(true);
    expect(adapter.isReadySignal('experimental/serverStatus', { health: 'ok', quiescent: false })).toBe(false);
    expect(adapter.isReadySignal('$/progress', { quiescent: true })).toBe(false);
  });

  it('gives slow workspace-wide requests a longer timeout', () => {
    expect(new RustAnalyzerAdapter(true).getTimeout('textDocument/references')).toBe(60000);
    expect(new RustAnalyzerAdapter(true).getTimeout('initialize')).toBe(120000);
    expect(new RustAnalyzerAdapter(false).getTimeout('textDocument/hover')).toBeUndefined();
  });
});
