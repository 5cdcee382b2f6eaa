/**
 * @file packages/core/src/config.ts
 * @description Loads runtime configuration from the environment, `.env` and `taskforce.config.yaml`.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parse as parseDotenv } from 'dotenv';
import {
  CONFIG_FILE_NAME,
  ENV_PREFIX,
  TaskforceConfigSchema,
  type TaskforceConfig,
} from '@taskforce/shared';
import { ConfigError } from './domain/errors/app-error.js';
export type { TaskforceConfig };

/**
 * Parses bool.
 * @param value - Value.
 * @returns The parse bool result.
 */
const parseBool = (value?: string): boolean | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
  return undefined;
};

/**
 * Parses list.
 * @param value - Value.
 * @returns The parse list result.
 */
const parseList = (value?: string): string[] | undefined => {
  if (!value) return undefined;
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const parseNumber = (value?: string): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Drops undefined entries so they never mask a lower-precedence source. */
const defined = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));

/**
 * Loads config.
 *
 * Precedence, highest first: `env`, the project's `.env` file, `taskforce.config.yaml`,
 * schema defaults. The `.env` file is read, never applied to `process.env`, and every
 * call returns a fresh value.
 */
export function loadConfig(
  projectRoot?: string,
  env: NodeJS.ProcessEnv = process.env,
): TaskforceConfig {
  const root = resolve(projectRoot || process.cwd());

  const envPath = join(root, '.env');
  const fromDotenv = existsSync(envPath) ? parseDotenv(readFileSync(envPath)) : {};
  const vars: Record<string, string | undefined> = { ...fromDotenv, ...env };
  const read = (key: string): string | undefined => vars[`${ENV_PREFIX}${key}`];

  const configPath = join(root, CONFIG_FILE_NAME);
  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    fileConfig = isRecord(parsed) ? parsed : {};
  }
  const filePlanner = isRecord(fileConfig.planner) ? fileConfig.planner : {};
  const fileBridge = isRecord(fileConfig.bridge) ? fileConfig.bridge : {};

  const merged = {
    ...fileConfig,
    planner: {
      ...filePlanner,
      ...defined({
        baseUrl: read('PLANNER_BASE_URL'),
        apiKey: read('PLANNER_API_KEY'),
        model: read('PLANNER_MODEL'),
        customProvider: read('PLANNER_CUSTOM_PROVIDER'),
        pollIntervalMs: parseNumber(read('PLANNER_POLL_INTERVAL_MS')),
        runTimeoutMs: parseNumber(read('PLANNER_RUN_TIMEOUT_MS')),
      }),
    },
    bridge: {
      ...fileBridge,
      ...defined({
        binaryPath: read('TOOL_BINARY'),
        args: parseList(read('TOOL_ARGS')),
        workspaceRoot: read('WORKSPACE_ROOT'),
        agentEnvVar: read('AGENT_ENV_VAR'),
        closeTimeoutMs: parseNumber(read('BRIDGE_CLOSE_TIMEOUT_MS')),
      }),
    },
    ...defined({
      orchestratorPrompt: read('ORCHESTRATOR_PROMPT'),
      defaultCheckInSeconds: parseNumber(read('DEFAULT_CHECK_IN_SECONDS')),
      unroutedSteps: read('UNROUTED_STEPS'),
      logLevel: read('LOG_LEVEL') ?? vars.LOG_LEVEL,
    }),
    logPretty:
      parseBool(read('LOG_PRETTY')) ?? fileConfig.logPretty ?? vars.NODE_ENV === 'development',
  };

  const result = TaskforceConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const config = result.data;
  return {
    ...config,
    bridge: { ...config.bridge, workspaceRoot: resolve(root, config.bridge.workspaceRoot) },
  };
}
