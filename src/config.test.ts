import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ra-mcp-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fills in defaults and uses the working directory as workspace root', () => {
    const config = loadConfig({}, '/work/demo');

    expect(config).toEqual({
      rustAnalyzerPath: 'rust-analyzer',
      rustAnalyzerArgs: [],
      cargoPath: 'cargo',
      fullAnalysis: true,
      logLevel: 'info',
      workspaceRoot: '/work/demo',
      requestTimeoutMs: 30000,
      readyTimeoutMs: 120000,
      shutdownGraceMs: 3000,
      restartIntervalMinutes: 0,
      checkTimeoutMs: 30000,
      checkMaxOutputBytes: 1024 * 1024,
      snippetPolicy: 'first',
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig(
      {
        RUST_ANALYZER_PATH: '/opt/ra/rust-analyzer',
        RA_MCP_FULL_ANALYSIS: 'false',
        RA_MCP_LOG_LEVEL: 'debug',
        RA_MCP_CHECK_TIMEOUT_MS: '5000',
        RA_MCP_SNIPPET_POLICY: 'unique',
      },
      '/work/demo'
    );

    expect(config.rustAnalyzerPath).toBe('/opt/ra/rust-analyzer');
    expect(config.fullAnalysis).toBe(false);
    expect(config.logLevel).toBe('debug');
    expect(config.checkTimeoutMs).toBe(5000);
    expect(config.snippetPolicy).toBe('unique');
  });

  it('layers the environment over the config file', () => {
    const configPath = join(dir, 'ra-mcp.json');
    writeFileSync(
      configPath,
      JSON.stringify({ rustAnalyzerArgs: ['--log-file', '/tmp/ra.log'], cargoPath: '/opt/cargo', requestTimeoutMs: 1000 })
    );

    const config = loadConfig({ RA_MCP_CONFIG_PATH: configPath, RA_MCP_REQUEST_TIMEOUT_MS: '2500' }, '/work/demo');

    expect(config.rustAnalyzerArgs).toEqual(['--log-file', '/tmp/ra.log']);
    expect(config.cargoPath).toBe('/opt/cargo');
    expect(config.requestTimeoutMs).toBe(2500);
  });

  it('rejects a relative workspace root', () => {
    expect(() => loadConfig({ RA_MCP_WORKSPACE_ROOT: 'demo' }, '/work')).toThrow(
      'Invalid configuration: workspaceRoot: workspaceRoot must be an absolute path'
    );
  });

  it('rejects malformed numbers and unknown log levels', () => {
    expect(() => loadConfig({ RA_MCP_CHECK_TIMEOUT_MS: 'soon' }, '/work')).toThrow(ValidationError);
    expect(() => loadConfig({ RA_MCP_LOG_LEVEL: 'loud' }, '/work')).toThrow(/logLevel/);
  });

  it('reports a config file that is not JSON', () => {
    const configPath = join(dir, 'broken.json');
    writeFileSync(configPath, '{ nope');

    expect(() => loadConfig({ RA_MCP_CONFIG_PATH: configPath }, '/work')).toThrow(
      `Config file ${configPath} is not valid JSON`
    );
  });

  it('reports a missing config file', () => {
    const configPath = join(dir, 'missing.json');
    expect(() => loadConfig({ RA_MCP_CONFIG_PATH: configPath }, '/work')).toThrow(
      `Config file does not exist: ${configPath}`
    );
  });
});
