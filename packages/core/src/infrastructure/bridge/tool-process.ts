/**
 * @file packages/core/src/infrastructure/bridge/tool-process.ts
 * @description Process handle abstraction used by the tool bridge.
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';

/** The slice of `ChildProcess` the bridge relies on. */
export interface ToolProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnRequest {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type ProcessSpawner = (
  command: string,
  args: readonly string[],
  request: SpawnRequest,
) => ToolProcess;

export const spawnToolProcess: ProcessSpawner = (command, args, request) =>
  spawn(command, args, {
    cwd: request.cwd,
    env: request.env,
    stdio: ['pipe', 'pipe', 'pipe'],
  });

export function hasExited(child: ToolProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}
