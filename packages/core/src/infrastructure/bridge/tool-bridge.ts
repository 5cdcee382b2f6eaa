/**
 * @file packages/core/src/infrastructure/bridge/tool-bridge.ts
 * @description Owns one tool-execution process per specialist execution scope and
 * exchanges line-delimited JSON requests and replies with it.
 */

import { mkdir } from 'node:fs/promises';
import { createInterface, type Interface } from 'node:readline';
import { setTimeout as delay } from 'node:timers/promises';
import type { Writable } from 'node:stream';
import {
  BridgeReplySchema,
  DEFAULT_BRIDGE_CLOSE_TIMEOUT_MS,
  serializeBridgeRequest,
  toBridgeResponse,
  type BridgeResponse,
  type ToolSession,
} from '@taskforce/shared';
import { BridgeError, ProtocolError } from '../../domain/errors/app-error.js';
import { Logger, silentLogger } from '../../logger.js';
import { AsyncQueue } from '../events/async-queue.js';
import { SerialLock } from './serial-lock.js';
import {
  hasExited,
  spawnToolProcess,
  type ProcessSpawner,
  type ToolProcess,
} from './tool-process.js';

export type BridgeState = 'unstarted' | 'connected' | 'closed';

export interface ToolBridgeOptions {
  command: string;
  args?: readonly string[];
  /** Environment variable that tells the process which agent it serves. */
  agentEnvVar?: string;
  /** Grace period for voluntary exit, and again after SIGKILL. */
  closeTimeoutMs?: number;
  /** Base environment; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  spawn?: ProcessSpawner;
  logger?: Logger;
}

/**
 * Parses one reply line. Replies must be a single JSON object.
 */
export function parseBridgeReply(raw: string): BridgeResponse {
  if (raw.trim() === '') {
    throw new ProtocolError('Tool process returned an empty response');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProtocolError(`Invalid JSON from tool process: ${raw}`);
  }
  const reply = BridgeReplySchema.safeParse(parsed);
  if (!reply.success) {
    throw new ProtocolError(`Tool process reply is not a JSON object: ${raw}`);
  }
  return toBridgeResponse(reply.data, raw);
}

/**
 * Manages a tool-execution session for a single specialist.
 *
 * UNSTARTED → CONNECTED → CLOSED. Requests are strictly serialized: the process must
 * answer request N before request N+1 is written, and replies are correlated by order.
 */
export class ToolBridge {
  private state: BridgeState = 'unstarted';
  private child?: ToolProcess;
  private lines?: AsyncQueue<string>;
  private readers: Interface[] = [];
  private readonly lock = new SerialLock();
  private closing?: Promise<void>;
  // Set when a reply may still be in flight for an abandoned request.
  private desynced = false;
  private readonly logger: Logger;

  constructor(
    readonly session: ToolSession,
    private readonly options: ToolBridgeOptions,
  ) {
    this.logger = (options.logger ?? silentLogger).child({
      agent: session.agentName,
      workspace: session.workspace,
    });
  }

  get status(): BridgeState {
    return this.state;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /**
   * Creates the workspace, spawns the process inside it and attaches to its pipes.
   */
  async start(): Promise<this> {
    if (this.state !== 'unstarted') {
      throw new BridgeError(`Tool bridge cannot start from state "${this.state}"`);
    }

    await mkdir(this.session.workspace, { recursive: true });

    const { command, args = [] } = this.options;
    const env: NodeJS.ProcessEnv = { ...(this.options.env ?? process.env) };
    const envVar = this.options.agentEnvVar ?? 'CODEX_AGENT_NAME';
    env[envVar] ??= this.session.agentName;

    const spawn = this.options.spawn ?? spawnToolProcess;
    let child: ToolProcess;
    try {
      child = spawn(command, args, { cwd: this.session.workspace, env });
    } catch (err) {
      this.state = 'closed';
      throw new BridgeError(`Failed to spawn tool process "${command}"`, { cause: err });
    }
    this.child = child;
    child.on('error', (err: Error) => {
      this.logger.warn({ err }, 'Tool process error');
    });

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      await this.close();
      throw new BridgeError('Failed to initialize tool process pipes');
    }

    try {
      await waitForSpawn(child);
    } catch (err) {
      await this.close();
      throw new BridgeError(`Failed to spawn tool process "${command}"`, { cause: err });
    }

    stdin.on('error', (err: Error) => {
      this.logger.warn({ err }, 'Tool process stdin error');
    });

    const lines = new AsyncQueue<string>();
    const output = createInterface({ input: stdout, crlfDelay: Infinity });
    output.on('line', (line) => lines.push(line));
    output.on('close', () => lines.close());
    this.readers.push(output);
    this.lines = lines;

    if (stderr) {
      const diagnostics = createInterface({ input: stderr, crlfDelay: Infinity });
      diagnostics.on('line', (line) => this.logger.debug({ stderr: line }, 'Tool process stderr'));
      this.readers.push(diagnostics);
    }

    this.state = 'connected';
    this.logger.debug({ pid: child.pid, command }, 'Tool process connected');
    return this;
  }

  /**
   * Sends one `{tool, kwargs}` request and reads exactly one reply line.
   * Concurrent callers queue behind the request in flight.
   */
  async request(
    tool: string,
    kwargs: Record<string, unknown> = {},
    signal?: AbortSignal,
  ): Promise<BridgeResponse> {
    const line = serializeBridgeRequest({ tool, kwargs });

    const raw = await this.lock.runExclusive(async () => {
      const stdin = this.child?.stdin;
      const lines = this.lines;
      if (this.state !== 'connected' || !stdin || !lines) {
        throw new BridgeError('Tool bridge is not connected');
      }
      if (this.desynced) {
        throw new BridgeError('Tool bridge lost reply correlation after an aborted request');
      }
      if (signal?.aborted) {
        throw new BridgeError(`Tool request "${tool}" aborted`);
      }

      await writeLine(stdin, line);
      const reply = await lines.next(signal);
      if (reply.done) {
        if (signal?.aborted) {
          this.desynced = true;
          throw new BridgeError(`Tool request "${tool}" aborted`);
        }
        throw new ProtocolError('Tool process returned an empty response');
      }
      return reply.value;
    });

    return parseBridgeReply(raw);
  }

  runCommand(command: string, signal?: AbortSignal): Promise<BridgeResponse> {
    return this.request('run_command', { command }, signal);
  }

  readFile(path: string, signal?: AbortSignal): Promise<BridgeResponse> {
    return this.request('read_file', { path }, signal);
  }

  applyPatch(path: string, patch: string, signal?: AbortSignal): Promise<BridgeResponse> {
    return this.request('apply_patch', { path, patch }, signal);
  }

  /**
   * Closes stdin, asks the process to terminate and kills it if it has not exited
   * within the grace period. Idempotent.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.state = 'closed';
    const child = this.child;
    const timeoutMs = this.options.closeTimeoutMs ?? DEFAULT_BRIDGE_CLOSE_TIMEOUT_MS;

    if (child) {
      const stdin = child.stdin;
      if (stdin && !stdin.writableEnded && !stdin.destroyed) {
        const finished = new Promise<void>((resolve) => {
          stdin.once('finish', () => resolve());
          stdin.once('close', () => resolve());
          stdin.once('error', () => resolve());
        });
        stdin.end();
        await settlesWithin(finished, timeoutMs);
      }

      if (!hasExited(child)) {
        const exited = new Promise<void>((resolve) => {
          child.once('exit', () => resolve());
        });
        child.kill('SIGTERM');
        if (!(await settlesWithin(exited, timeoutMs))) {
          this.logger.warn({ timeoutMs }, 'Tool process ignored SIGTERM; killing it');
          child.kill('SIGKILL');
          if (!(await settlesWithin(exited, timeoutMs))) {
            this.logger.error({ pid: child.pid }, 'Tool process did not exit after SIGKILL');
          }
        }
      }
    }

    for (const reader of this.readers) {
      reader.close();
    }
    this.readers = [];
    this.lines?.close();
    this.logger.debug('Tool bridge closed');
  }
}

/**
 * Opens a bridge for the duration of `task`; the process is closed on every exit path.
 */
export async function withToolBridge<T>(
  session: ToolSession,
  options: ToolBridgeOptions,
  task: (bridge: ToolBridge) => Promise<T>,
): Promise<T> {
  const bridge = new ToolBridge(session, options);
  try {
    await bridge.start();
    return await task(bridge);
  } finally {
    await bridge.close();
  }
}

function waitForSpawn(child: ToolProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      child.off('spawn', onSpawn);
      reject(err);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function writeLine(stdin: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stdin.write(line, (err) => {
      if (err) {
        reject(new BridgeError('Failed to write to tool process', { cause: err }));
      } else {
        resolve();
      }
    });
  });
}

async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  const timer = new AbortController();
  try {
    return await Promise.race([
      promise.then(() => true),
      delay(ms, false, { signal: timer.signal }),
    ]);
  } finally {
    timer.abort();
  }
}
