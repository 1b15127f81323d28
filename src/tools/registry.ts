import type { z } from 'zod';
import type { AnalyzerClient } from '../analyzer-client.js';
import type { CheckRunner } from '../check-runner.js';
import { BridgeError, CheckError, CorrelatorError, ValidationError, errorMessage } from '../errors.js';
import { diagnostic, formatToolResult } from '../formatter.js';
import type { Logger } from '../logger.js';
import type { PositionResolver } from '../position-resolver.js';
import type { OutputMode, ToolFailure, ToolResult } from '../types.js';
import { requireAbsolutePath } from '../utils.js';

export interface ToolContext {
  client: AnalyzerClient;
  resolver: PositionResolver;
  checkRunner: CheckRunner;
  logger: Logger;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface ToolOutput<T> {
  data: T;
  warnings?: string[];
}

export interface ToolDefinition<S extends z.ZodTypeAny, T> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  params: S;
  /** Parameters that must hold absolute paths, checked before any I/O. */
  paths?: (params: z.infer<S>) => Array<[name: string, value: string]>;
  execute(params: z.infer<S>, ctx: ToolContext): Promise<ToolOutput<T>>;
  render(data: T): string;
}

export interface ToolInvocation {
  result: ToolResult;
  text: string;
}

/** A tool with its parameter and payload types erased, as the registry stores it. */
export interface ToolHandler {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  invoke(args: unknown, ctx: ToolContext): Promise<ToolInvocation>;
}

export const outputFormatProperty = {
  output_format: {
    type: 'string',
    enum: ['text', 'json'],
    description: 'Render the result as readable text (default) or as the JSON result envelope',
    default: 'text',
  },
};

function requestedMode(args: unknown): OutputMode {
  return typeof args === 'object' && args !== null && 'output_format' in args && args.output_format === 'json'
    ? 'json'
    : 'text';
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Maps any thrown value onto the structured failure a caller sees. */
export function toFailure(error: unknown): ToolFailure {
  if (error instanceof CheckError) {
    return {
      kind: error.kind,
      message: error.message,
      partial:
        error.kind === 'spawn_failed'
          ? undefined
          : { diagnostics: error.diagnostics.map(diagnostic), skipped_lines: error.skippedLines },
    };
  }
  if (error instanceof CorrelatorError && error.kind === 'remote') {
    return { kind: 'remote', message: `${error.message}${error.code !== undefined ? ` (code ${error.code})` : ''}` };
  }
  if (error instanceof BridgeError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'internal', message: errorMessage(error) };
}

export function defineTool<S extends z.ZodTypeAny, T>(definition: ToolDefinition<S, T>): ToolHandler {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async invoke(args, ctx) {
      const mode = requestedMode(args);
      let result: ToolResult<T>;

      try {
        const parsed = definition.params.safeParse(args ?? {});
        if (!parsed.success) {
          throw new ValidationError('invalid_params', describeIssues(parsed.error));
        }
        const params: z.infer<S> = parsed.data;
        for (const [name, value] of definition.paths?.(params) ?? []) {
          requireAbsolutePath(value, name);
        }

        const output = await definition.execute(params, ctx);
        result = { ok: true, tool: definition.name, data: output.data, warnings: output.warnings ?? [] };
      } catch (error) {
        const failure = toFailure(error);
        if (failure.kind === 'internal') {
          ctx.logger.error('tools', `${definition.name} failed unexpectedly: ${failure.message}`);
        } else {
          ctx.logger.debug('tools', `${definition.name} failed [${failure.kind}]: ${failure.message}`);
        }
        result = { ok: false, tool: definition.name, error: failure };
      }

      return { result, text: formatToolResult(result, mode, definition.render) };
    },
  };
}

/**
 * Tool name → handler. Unknown names and every handler failure come back as
 * structured results; nothing thrown escapes `call`.
 */
export class ToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(handlers: ToolHandler[] = []) {
    for (const handler of handlers) this.register(handler);
  }

  register(handler: ToolHandler): void {
    if (this.handlers.has(handler.name)) {
      throw new Error(`Tool ${handler.name} is already registered`);
    }
    this.handlers.set(handler.name, handler);
  }

  list(): Array<{ name: string; description: string; inputSchema: ToolInputSchema }> {
    return [...this.handlers.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  async call(name: string, args: unknown, ctx: ToolContext): Promise<ToolInvocation> {
    const handler = this.handlers.get(name);
    if (!handler) {
      const result: ToolResult = {
        ok: false,
        tool: name,
        error: { kind: 'unknown_tool', message: `Unknown tool: ${name}. Available: ${[...this.handlers.keys()].join(', ')}` },
      };
      return { result, text: formatToolResult(result, requestedMode(args)) };
    }
    return handler.invoke(args, ctx);
  }
}
