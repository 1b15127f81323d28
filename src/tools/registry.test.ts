import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createHarness } from '../../test/harness.js';
import { CheckError, CorrelatorError, ToolError } from '../errors.js';
import { ToolRegistry, defineTool, toFailure } from './registry.js';

const echo = defineTool({
  name: 'echo',
  description: 'Echo a file path back',
  inputSchema: {
    type: 'object',
    properties: { file_path: { type: 'string' }, shout: { type: 'boolean' } },
    required: ['file_path'],
  },
  params: z.object({ file_path: z.string().min(1), shout: z.boolean().default(false) }),
  paths: (params) => [['file_path', params.file_path]],
  async execute(params) {
    return {
      data: { path: params.shout ? params.file_path.toUpperCase() : params.file_path },
      warnings: params.shout ? ['shouting'] : [],
    };
  },
  render: (data) => `echo ${data.path}`,
});

const broken = defineTool({
  name: 'broken',
  description: 'Always fails',
  inputSchema: { type: 'object', properties: {} },
  params: z.object({}),
  async execute(): Promise<{ data: null }> {
    throw new ToolError('not_found', 'nothing here');
  },
  render: () => '',
});

describe('ToolRegistry', () => {
  const harness = createHarness('/work/demo');
  const registry = new ToolRegistry([echo, broken]);

  afterEach(async () => {
    await harness.close();
  });

  it('lists tools with their schemas', () => {
    expect(registry.list().map((tool) => tool.name)).toEqual(['echo', 'broken']);
    expect(registry.list()[0]?.inputSchema.required).toEqual(['file_path']);
  });

  it('refuses to register a name twice', () => {
    expect(() => registry.register(echo)).toThrow('Tool echo is already registered');
  });

  it('renders successes as text with warnings first', async () => {
    const { result, text } = await registry.call('echo', { file_path: '/a.rs', shout: true }, harness.ctx);
    expect(result).toEqual({ ok: true, tool: 'echo', data: { path: '/A.RS' }, warnings: ['shouting'] });
    expect(text).toBe('Warning: shouting\n\necho /A.RS');
  });

  it('renders the JSON envelope when asked', async () => {
    const { text } = await registry.call('echo', { file_path: '/a.rs', output_format: 'json' }, harness.ctx);
    expect(JSON.parse(text)).toEqual({ ok: true, tool: 'echo', data: { path: '/a.rs' }, warnings: [] });
  });

  it('reports parameter problems as invalid_params', async () => {
    const { result } = await registry.call('echo', { shout: 'yes' }, harness.ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid_params');
      expect(result.error.message).toContain('file_path: Required');
    }
  });

  it('rejects relative paths before running the tool', async () => {
    const { result, text } = await registry.call('echo', { file_path: 'src/lib.rs' }, harness.ctx);
    expect(result).toEqual({
      ok: false,
      tool: 'echo',
      error: { kind: 'relative_path', message: 'file_path must be an absolute path, got "src/lib.rs"' },
    });
    expect(text).toBe('Error [relative_path]: file_path must be an absolute path, got "src/lib.rs"');
  });

  it('turns thrown tool errors into failures', async () => {
    const { result } = await registry.call('broken', {}, harness.ctx);
    expect(result).toEqual({ ok: false, tool: 'broken', error: { kind: 'not_found', message: 'nothing here' } });
  });

  it('answers unknown tools with the list of known ones', async () => {
    const { result } = await registry.call('nope', {}, harness.ctx);
    expect(result).toEqual({
      ok: false,
      tool: 'nope',
      error: { kind: 'unknown_tool', message: 'Unknown tool: nope. Available: echo, broken' },
    });
  });
});

describe('toFailure', () => {
  it('carries partial diagnostics of an interrupted check', () => {
    expect(toFailure(new CheckError('timeout', 'too slow', [], 2))).toEqual({
      kind: 'timeout',
      message: 'too slow',
      partial: { diagnostics: [], skipped_lines: 2 },
    });
    expect(toFailure(new CheckError('spawn_failed', 'no cargo'))).toEqual({
      kind: 'spawn_failed',
      message: 'no cargo',
      partial: undefined,
    });
  });

  it('appends the remote error code', () => {
    expect(toFailure(new CorrelatorError('remote', 'content modified', 'textDocument/hover', -32801))).toEqual({
      kind: 'remote',
      message: 'content modified (code -32801)',
    });
  });

  it('classifies anything else as internal', () => {
    expect(toFailure(new TypeError('boom'))).toEqual({ kind: 'internal', message: 'boom' });
  });
});
