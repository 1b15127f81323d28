import { z } from 'zod';
import { formatDiagnosticLine } from '../formatter.js';
import { formatSummary, summarize } from './analysis.js';
import { outputFormat } from './locator.js';
import { defineTool, outputFormatProperty } from './registry.js';

export const runCargoCheck = defineTool({
  name: 'run_cargo_check',
  description:
    'Run `cargo check` (or `cargo clippy`) in a workspace under a hard timeout and output cap, and return its diagnostics. On timeout or truncation the diagnostics parsed so far are returned with the failure.',
  inputSchema: {
    type: 'object',
    properties: {
      workspace_path: {
        type: 'string',
        description: 'Absolute path to the directory holding Cargo.toml',
      },
      command: {
        type: 'string',
        enum: ['check', 'clippy'],
        description: 'Which cargo subcommand to run',
        default: 'check',
      },
      all_targets: {
        type: 'boolean',
        description: 'Pass --all-targets (tests, benches, examples)',
        default: false,
      },
      package: { type: 'string', description: 'Only check this package (-p)' },
      ...outputFormatProperty,
    },
    required: ['workspace_path'],
  },
  params: z.object({
    workspace_path: z.string().min(1),
    command: z.enum(['check', 'clippy']).default('check'),
    all_targets: z.boolean().default(false),
    package: z
      .string()
      .regex(/^[A-Za-z0-9_-]+(@[A-Za-z0-9.+-]+)?$/, 'must be a package name')
      .optional(),
    output_format: outputFormat,
  }),
  paths: (params) => [['workspace_path', params.workspace_path]],
  async execute(params, ctx) {
    const extraArgs: string[] = [];
    if (params.all_targets) extraArgs.push('--all-targets');
    if (params.package) extraArgs.push('-p', params.package);

    const report = await ctx.checkRunner.runCheck(params.workspace_path, {
      command: params.command,
      extraArgs,
    });

    const warnings: string[] = [];
    if (report.skippedLines > 0) {
      warnings.push(`${report.skippedLines} line(s) of cargo output were not JSON and were skipped`);
    }
    if (report.success === undefined) {
      warnings.push(
        `cargo exited with code ${report.exitCode ?? 'none'} before finishing the build: ${report.stderr.trim().split('\n').slice(-3).join(' | ')}`
      );
    }

    return {
      data: {
        command: report.command,
        success: report.success ?? false,
        exit_code: report.exitCode,
        skipped_lines: report.skippedLines,
        summary: summarize(report.diagnostics),
        diagnostics: report.diagnostics,
      },
      warnings,
    };
  },
  render(data) {
    const status = data.success ? 'succeeded' : 'failed';
    const header = `cargo ${data.command} ${status}: ${formatSummary(data.summary)}`;
    if (data.diagnostics.length === 0) return header;
    return `${header}\n${data.diagnostics.map(formatDiagnosticLine).join('\n')}`;
  },
});

export const cargoTools = [runCargoCheck];
