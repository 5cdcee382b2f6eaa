import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigError } from './domain/errors/app-error.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'taskforce-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('falls back to defaults with no files and an empty environment', () => {
    const config = loadConfig(root, {});

    expect(config.planner).toEqual({
      baseUrl: 'http://localhost:4000/',
      apiKey: 'dummy-key',
      model: 'gpt-4.1-mini',
      customProvider: 'openai',
      pollIntervalMs: 500,
      runTimeoutMs: 300_000,
    });
    expect(config.bridge.workspaceRoot).toBe(join(root, 'workspaces'));
    expect(config.bridge.args).toEqual(['cli', 'mcp']);
    expect(config.unroutedSteps).toBe('drop');
    expect(config.defaultCheckInSeconds).toBe(300);
    expect(config.logPretty).toBe(false);
  });

  it('layers the environment over .env over the YAML file', async () => {
    await writeFile(
      join(root, 'taskforce.config.yaml'),
      [
        'planner:',
        '  model: from-yaml',
        '  apiKey: yaml-key',
        'bridge:',
        '  workspaceRoot: agents',
        'unroutedSteps: defer',
        '',
      ].join('\n'),
    );
    await writeFile(
      join(root, '.env'),
      'TASKFORCE_PLANNER_MODEL=from-dotenv\nTASKFORCE_PLANNER_API_KEY=test-secret\n',
    );

    const config = loadConfig(root, {
      TASKFORCE_PLANNER_MODEL: 'from-env',
      TASKFORCE_TOOL_ARGS: 'serve, --stdio',
    });

    expect(config.planner.model).toBe('from-env');
    expect(config.planner.apiKey).toBe('test-secret');
    expect(config.bridge.workspaceRoot).toBe(join(root, 'agents'));
    expect(config.bridge.args).toEqual(['serve', '--stdio']);
    expect(config.unroutedSteps).toBe('defer');
  });

  it('reads numbers, booleans and the plain LOG_LEVEL variable', () => {
    const config = loadConfig(root, {
      TASKFORCE_DEFAULT_CHECK_IN_SECONDS: '60',
      TASKFORCE_BRIDGE_CLOSE_TIMEOUT_MS: '250',
      TASKFORCE_LOG_PRETTY: 'yes',
      LOG_LEVEL: 'debug',
    });

    expect(config.defaultCheckInSeconds).toBe(60);
    expect(config.bridge.closeTimeoutMs).toBe(250);
    expect(config.logPretty).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('enables pretty logs in development unless told otherwise', () => {
    expect(loadConfig(root, { NODE_ENV: 'development' }).logPretty).toBe(true);
    expect(
      loadConfig(root, { NODE_ENV: 'development', TASKFORCE_LOG_PRETTY: 'off' }).logPretty,
    ).toBe(false);
  });

  it('rejects an unknown unrouted-step policy', () => {
    expect(() => loadConfig(root, { TASKFORCE_UNROUTED_STEPS: 'ignore' })).toThrow(ConfigError);
  });

  it('leaves process.env untouched when reading .env', async () => {
    await writeFile(join(root, '.env'), 'TASKFORCE_DOTENV_ONLY=1\n');

    loadConfig(root, {});

    expect(process.env.TASKFORCE_DOTENV_ONLY).toBeUndefined();
  });
});
