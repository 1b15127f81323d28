import { z } from 'zod';
import { outputFormat } from './locator.js';
import { defineTool, outputFormatProperty } from './registry.js';

export const restartAnalyzer = defineTool({
  name: 'restart_analyzer',
  description:
    'Shut down the running rust-analyzer and start a fresh one. Use when results look stale or the analyzer is stuck.',
  inputSchema: {
    type: 'object',
    properties: { ...outputFormatProperty },
  },
  params: z.object({ output_format: outputFormat }),
  async execute(_params, ctx) {
    const session = await ctx.client.restart();
    return {
      data: {
        session: session.id,
        pid: session.pid ?? null,
        state: session.state,
        position_encoding: session.positionEncoding,
      },
    };
  },
  render(data) {
    const pid = data.pid === null ? '' : ` (pid ${data.pid})`;
    return `rust-analyzer restarted: session ${data.session}${pid} is ${data.state}`;
  },
});

export const lifecycleTools = [restartAnalyzer];
