/**
 * @file packages/core/src/testing/fake-tool-process.ts
 * @description In-process stand-in for a tool-execution subprocess, for tests.
 */

import { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import { PassThrough } from 'node:stream';
import { BridgeRequestSchema, type BridgeRequest } from '@taskforce/shared';
import type { ProcessSpawner, SpawnRequest, ToolProcess } from '../infrastructure/bridge/tool-process.js';

/** A reply object, a raw line written verbatim, or `null` for no reply at all. */
export type FakeReply = Record<string, unknown> | string | null;

export interface FakeToolProcessOptions {
  reply?: (request: BridgeRequest) => FakeReply;
  replyDelayMs?: number;
  /** Exit with code 1 instead of replying when this tool is requested. */
  exitOn?: string;
  /** Exit voluntarily once stdin is closed. Defaults to true. */
  exitOnStdinEnd?: boolean;
  ignoreSigterm?: boolean;
  failSpawn?: Error;
}

const defaultReply = (request: BridgeRequest): FakeReply => ({
  ok: true,
  tool: request.tool,
  echo: request.kwargs,
});

export class FakeToolProcess extends EventEmitter implements ToolProcess {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  readonly requests: BridgeRequest[] = [];
  /** `in:<tool>` when a request arrives, `out:<tool>` when its reply is written. */
  readonly log: string[] = [];
  readonly signals: Array<NodeJS.Signals | number> = [];
  stdinEnded = false;

  constructor(private readonly options: FakeToolProcessOptions = {}) {
    super();

    const input = createInterface({ input: this.stdin, crlfDelay: Infinity });
    input.on('line', (line) => this.handle(line));
    this.stdin.on('finish', () => {
      this.stdinEnded = true;
      if (options.exitOnStdinEnd ?? true) {
        this.exit(0, null);
      }
    });

    process.nextTick(() => {
      if (options.failSpawn) {
        this.emit('error', options.failSpawn);
      } else {
        this.emit('spawn');
      }
    });
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.options.ignoreSigterm) {
      return true;
    }
    this.exit(null, typeof signal === 'string' ? signal : 'SIGKILL');
    return true;
  }

  private handle(line: string): void {
    const request = BridgeRequestSchema.parse(JSON.parse(line));
    this.requests.push(request);
    this.log.push(`in:${request.tool}`);

    if (this.options.exitOn === request.tool) {
      this.exit(1, null);
      return;
    }

    const reply = (this.options.reply ?? defaultReply)(request);
    if (reply === null) return;

    const write = () => {
      if (this.exitCode !== null || this.signalCode !== null) return;
      this.log.push(`out:${request.tool}`);
      this.stdout.write(`${typeof reply === 'string' ? reply : JSON.stringify(reply)}\n`);
    };
    const delayMs = this.options.replyDelayMs ?? 0;
    if (delayMs > 0) {
      setTimeout(write, delayMs);
    } else {
      write();
    }
  }

  private exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    process.nextTick(() => this.emit('exit', code, signal));
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  request: SpawnRequest;
}

/**
 * A spawner that hands out fake processes and records how it was called.
 */
export function createFakeSpawner(options: FakeToolProcessOptions = {}): {
  spawn: ProcessSpawner;
  processes: FakeToolProcess[];
  calls: SpawnCall[];
} {
  const processes: FakeToolProcess[] = [];
  const calls: SpawnCall[] = [];
  const spawn: ProcessSpawner = (command, args, request) => {
    calls.push({ command, args, request });
    const child = new FakeToolProcess(options);
    processes.push(child);
    return child;
  };
  return { spawn, processes, calls };
}
