import { AnalyzerClient } from '../src/analyzer-client.js';
import { CheckRunner } from '../src/check-runner.js';
import { silentLogger } from '../src/logger.js';
import { RustAnalyzerAdapter } from '../src/lsp/adapters/rust-analyzer.js';
import { ProcessSupervisor } from '../src/lsp/supervisor.js';
import { PositionResolver } from '../src/position-resolver.js';
import { type ToolContext, createToolRegistry } from '../src/tools/index.js';
import type { ToolInvocation } from '../src/tools/registry.js';
import { type FakeAnalyzerOptions, fakeSpawner } from './fake-analyzer.js';
import { type FakeCheckOptions, fakeCheckSpawner } from './fake-process.js';

export interface HarnessOptions {
  analyzer?: FakeAnalyzerOptions | (() => FakeAnalyzerOptions);
  cargo?: FakeCheckOptions;
}

/** The full tool stack wired to in-process fakes for rust-analyzer and cargo. */
export function createHarness(workspaceRoot: string, options: HarnessOptions = {}) {
  const analyzer = fakeSpawner(options.analyzer ?? {});
  const cargo = fakeCheckSpawner(options.cargo ?? {});
  const supervisor = new ProcessSupervisor({
    command: 'rust-analyzer',
    workspaceRoot,
    adapter: new RustAnalyzerAdapter(true),
    spawn: analyzer.spawn,
    logger: silentLogger,
    readyTimeoutMs: 1000,
    shutdownGraceMs: 200,
  });
  const ctx: ToolContext = {
    client: new AnalyzerClient(supervisor, {
      logger: silentLogger,
      diagnosticsWait: { maxWaitTime: 200, idleTime: 20, checkInterval: 10 },
    }),
    resolver: new PositionResolver(),
    checkRunner: new CheckRunner({ spawn: cargo.spawn, logger: silentLogger }),
    logger: silentLogger,
  };
  const registry = createToolRegistry();

  return {
    ctx,
    registry,
    supervisor,
    analyzer,
    cargo,
    call: (name: string, args: unknown): Promise<ToolInvocation> => registry.call(name, args, ctx),
    close: () => supervisor.shutdown(),
  };
}
