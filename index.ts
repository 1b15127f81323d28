#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { AnalyzerClient } from './src/analyzer-client.js';
import { CheckRunner } from './src/check-runner.js';
import { loadConfig } from './src/config.js';
import { errorMessage } from './src/errors.js';
import { toCallToolResult } from './src/formatter.js';
import { logger } from './src/logger.js';
import { RustAnalyzerAdapter } from './src/lsp/adapters/rust-analyzer.js';
import { ProcessSupervisor } from './src/lsp/supervisor.js';
import { PositionResolver } from './src/position-resolver.js';
import { type ToolContext, createToolRegistry } from './src/tools/index.js';

const SERVER_NAME = 'ra-mcp';
const SERVER_VERSION = '0.1.0';

const args = process.argv.slice(2);
if (args.length > 0) {
  console.error(`Unknown argument: ${args[0]}`);
  console.error('ra-mcp takes no arguments. Configure it through environment variables:');
  console.error('  RA_MCP_WORKSPACE_ROOT, RUST_ANALYZER_PATH, RA_MCP_FULL_ANALYSIS, RA_MCP_LOG_LEVEL, ...');
  process.exit(1);
}

let config: ReturnType<typeof loadConfig>;
try {
  config = loadConfig();
} catch (error) {
  logger.error('config', errorMessage(error));
  process.exit(1);
}
logger.setLevel(config.logLevel);

const supervisor = new ProcessSupervisor({
  command: config.rustAnalyzerPath,
  args: config.rustAnalyzerArgs,
  workspaceRoot: config.workspaceRoot,
  adapter: new RustAnalyzerAdapter(config.fullAnalysis),
  logger,
  requestTimeoutMs: config.requestTimeoutMs,
  readyTimeoutMs: config.readyTimeoutMs,
  shutdownGraceMs: config.shutdownGraceMs,
  restartIntervalMinutes: config.restartIntervalMinutes,
  clientInfo: { name: SERVER_NAME, version: SERVER_VERSION },
});

const context: ToolContext = {
  client: new AnalyzerClient(supervisor, { logger }),
  resolver: new PositionResolver({ snippetPolicy: config.snippetPolicy }),
  checkRunner: new CheckRunner({
    cargoPath: config.cargoPath,
    timeoutMs: config.checkTimeoutMs,
    maxOutputBytes: config.checkMaxOutputBytes,
    logger,
  }),
  logger,
};

const registry = createToolRegistry();

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: registry.list() };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: toolArgs } = request.params;
  const { result, text } = await registry.call(name, toolArgs ?? {}, context);
  return toCallToolResult(result, text);
});

async function shutdown(signal: string): Promise<void> {
  logger.info('server', `received ${signal}, shutting down`);
  try {
    await supervisor.shutdown();
  } catch (error) {
    logger.error('server', `shutdown failed: ${errorMessage(error)}`);
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('server', `${SERVER_NAME} running on stdio for ${config.workspaceRoot}`);

  // Warm up the analyzer so the first tool call does not pay for workspace loading.
  supervisor.ensureReady().catch((error) => {
    logger.warn('server', `rust-analyzer warm start failed: ${errorMessage(error)}`);
  });
}

main().catch(async (error) => {
  logger.error('server', `fatal: ${errorMessage(error)}`);
  await supervisor.shutdown().catch((shutdownError) => {
    logger.error('server', `shutdown failed: ${errorMessage(shutdownError)}`);
  });
  process.exit(1);
});
