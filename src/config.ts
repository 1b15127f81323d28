import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute } from 'node:path';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

export const ConfigSchema = z.object({
  rustAnalyzerPath: z.string().min(1).default('rust-analyzer'),
  rustAnalyzerArgs: z.array(z.string()).default([]),
  cargoPath: z.string().min(1).default('cargo'),
  fullAnalysis: booleanFlag.default(true),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  workspaceRoot: z
    .string()
    .refine((value) => isAbsolute(value), 'workspaceRoot must be an absolute path'),
  requestTimeoutMs: positiveInt.default(30000),
  readyTimeoutMs: positiveInt.default(120000),
  shutdownGraceMs: positiveInt.default(3000),
  restartIntervalMinutes: z.coerce.number().nonnegative().default(0),
  checkTimeoutMs: positiveInt.default(30000),
  checkMaxOutputBytes: positiveInt.default(1024 * 1024),
  snippetPolicy: z.enum(['first', 'unique']).default('first'),
});

export type Config = z.infer<typeof ConfigSchema>;

const ENV_KEYS: Record<string, keyof Config> = {
  RUST_ANALYZER_PATH: 'rustAnalyzerPath',
  RA_MCP_CARGO_PATH: 'cargoPath',
  RA_MCP_FULL_ANALYSIS: 'fullAnalysis',
  RA_MCP_LOG_LEVEL: 'logLevel',
  RA_MCP_WORKSPACE_ROOT: 'workspaceRoot',
  RA_MCP_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  RA_MCP_READY_TIMEOUT_MS: 'readyTimeoutMs',
  RA_MCP_RESTART_INTERVAL_MINUTES: 'restartIntervalMinutes',
  RA_MCP_CHECK_TIMEOUT_MS: 'checkTimeoutMs',
  RA_MCP_CHECK_MAX_OUTPUT_BYTES: 'checkMaxOutputBytes',
  RA_MCP_SNIPPET_POLICY: 'snippetPolicy',
};

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    throw new ValidationError('invalid_params', `Config file does not exist: ${configPath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      'invalid_params',
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('invalid_params', `Config file ${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Builds the config from an optional JSON file (`RA_MCP_CONFIG_PATH`)
 * overlaid with environment variables. Environment wins over the file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const raw: Record<string, unknown> = { workspaceRoot: cwd };

  const configPath = env.RA_MCP_CONFIG_PATH;
  if (configPath) Object.assign(raw, readConfigFile(configPath));

  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError('invalid_params', `Invalid configuration: ${details}`);
  }
  return result.data;
}
