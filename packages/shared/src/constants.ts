/**
 * @file packages/shared/src/constants.ts
 * @description Defines module behavior for the Taskforce workspace.
 */

// ─── Taskforce Constants ──────────────────────────────────────

export const TASKFORCE_VERSION = '0.1.0';

/** Fallback cadence for specialist check-ins and plan communication. */
export const DEFAULT_CHECK_IN_SECONDS = 300;

/** Longest interval a Node timer accepts, in whole seconds (2^31 - 1 ms). */
export const MAX_CHECK_IN_SECONDS = 2_147_483;

/** Grace period between asking a tool process to exit and killing it. */
export const DEFAULT_BRIDGE_CLOSE_TIMEOUT_MS = 5000;

export const DEFAULT_CAPABILITIES = ['planning', 'execution'] as const;

export const CONFIG_FILE_NAME = 'taskforce.config.yaml';

export const ENV_PREFIX = 'TASKFORCE_';
