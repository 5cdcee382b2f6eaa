/**
 * @file packages/core/src/domain/logic/specialist.ts
 * @description Worker agent for one plan role. Drains its private step queue one step
 * at a time, turning each step into tool actions run through a tool bridge.
 */

import {
  DEFAULT_CAPABILITIES,
  MAX_CHECK_IN_SECONDS,
  SpecialistEvents,
  type RoleSpec,
  type ToolSession,
  type WorkflowStep,
} from '@taskforce/shared';
import { LifecycleError, errorCode, errorMessage } from '../errors/app-error.js';
import { AsyncQueue } from '../../infrastructure/events/async-queue.js';
import { withToolBridge, type ToolBridgeOptions } from '../../infrastructure/bridge/tool-bridge.js';
import type { BridgeToolRegistry } from '../../tools/registry.js';
import { BaseAgent, type AgentContext } from './base-agent.js';
import { parseActions } from './transcript.js';

export interface SpecialistOptions extends AgentContext {
  spec: RoleSpec;
  session: ToolSession;
  tools: BridgeToolRegistry;
  /** How to launch the tool process; the session supplies workspace and agent name. */
  bridge: Omit<ToolBridgeOptions, 'logger'>;
}

export class Specialist extends BaseAgent {
  readonly spec: RoleSpec;
  readonly session: ToolSession;
  private readonly tools: BridgeToolRegistry;
  private readonly bridgeOptions: Omit<ToolBridgeOptions, 'logger'>;
  private readonly queue = new AsyncQueue<WorkflowStep>();
  private readonly controller = new AbortController();
  private loop?: Promise<void>;
  private stopping?: Promise<void>;
  private heartbeat?: NodeJS.Timeout;
  private current: WorkflowStep | null = null;

  constructor(options: SpecialistOptions) {
    super(options.spec.handle, options.spec.displayName, options);
    this.spec = options.spec;
    this.session = options.session;
    this.tools = options.tools;
    this.bridgeOptions = options.bridge;
  }

  get handle(): string {
    return this.spec.handle;
  }

  get running(): boolean {
    return this.loop !== undefined && !this.controller.signal.aborted;
  }

  get currentStep(): WorkflowStep | null {
    return this.current;
  }

  get instructions(): string {
    const capabilities = this.spec.capabilities.length
      ? this.spec.capabilities
      : DEFAULT_CAPABILITIES;
    return [
      `Role: ${this.spec.displayName}`,
      `Mission: ${this.spec.mission}`,
      `Workspace: ${this.session.workspace} (agent: ${this.session.agentName}).`,
      `Check-ins every ${this.spec.checkInSeconds} seconds.`,
      `Capabilities: ${capabilities.join(', ')}`,
      this.spec.instructions,
      'Available tools:',
      this.tools.describe(),
      'When you produce actions, respond with JSON using the schema {"actions": [{"tool": str, "arguments": dict}]}.',
    ]
      .filter((line) => line.trim() !== '')
      .join('\n');
  }

  /**
   * Provisions the persona, announces the boot on `status` and starts draining the queue.
   */
  async start(): Promise<void> {
    if (this.controller.signal.aborted) {
      throw new LifecycleError(`Specialist ${this.handle} has been stopped`);
    }
    if (this.loop) return;

    await this.boot(this.instructions, this.controller.signal);
    await this.emit({
      event: SpecialistEvents.BOOT,
      handle: this.handle,
      workspace: this.session.workspace,
    });

    this.heartbeat = setInterval(() => {
      this.beat().catch((err: unknown) => {
        this.logger.warn({ err }, 'Heartbeat failed');
      });
    }, Math.min(this.spec.checkInSeconds, MAX_CHECK_IN_SECONDS) * 1000);
    this.heartbeat.unref();

    this.loop = this.drain().catch((err: unknown) => {
      this.logger.error({ err }, 'Step loop crashed');
    });
    this.logger.info({ workspace: this.session.workspace }, 'Specialist started');
  }

  receiveStep(step: WorkflowStep): void {
    if (!this.queue.push(step)) {
      throw new LifecycleError(`Specialist ${this.handle} is stopped; step "${step.name}" rejected`);
    }
  }

  /** Steps queued but not yet started. */
  pendingSteps(): readonly WorkflowStep[] {
    return this.queue.peek();
  }

  /**
   * Starts no further steps, aborts the step in flight and discards the queue. Resolves
   * once the loop has exited.
   */
  stop(): Promise<void> {
    this.stopping ??= this.halt();
    return this.stopping;
  }

  private async halt(): Promise<void> {
    clearInterval(this.heartbeat);
    this.queue.close();
    const dropped = this.queue.clear();
    this.controller.abort();
    await this.loop;
    this.logger.info({ dropped: dropped.length }, 'Specialist stopped');
  }

  private async drain(): Promise<void> {
    const { signal } = this.controller;
    for (;;) {
      const next = await this.queue.next(signal);
      if (next.done) return;

      const step = next.value;
      this.current = step;
      try {
        await this.executeStep(step, signal);
      } catch (err) {
        if (signal.aborted) {
          this.logger.info({ step: step.name }, 'Step interrupted by stop');
          return;
        }
        this.logger.warn({ step: step.name, err }, 'Step failed');
        await this.emit({
          event: SpecialistEvents.ERROR,
          handle: this.handle,
          step: step.name,
          error: errorMessage(err),
          code: errorCode(err),
        });
      } finally {
        this.current = null;
      }
    }
  }

  private async executeStep(step: WorkflowStep, signal: AbortSignal): Promise<void> {
    await this.emit({
      event: SpecialistEvents.STEP_START,
      handle: this.handle,
      step: step.name,
      description: step.description,
    });

    const response = await this.sendModelMessage(this.taskPrompt(step), {
      metadata: { step: step.name },
      signal,
    });
    const actions = parseActions(response.messages);

    await withToolBridge(
      this.session,
      { ...this.bridgeOptions, logger: this.logger },
      async (bridge) => {
        for (const action of actions) {
          const result = await this.tools.dispatch(bridge, action, signal);
          await this.emit({
            event: SpecialistEvents.TOOL_ACTION,
            handle: this.handle,
            step: step.name,
            tool: action.tool,
            ok: result.ok,
            result: result.data,
            raw: result.raw,
          });
        }
      },
    );

    await this.emit({
      event: SpecialistEvents.STEP_COMPLETE,
      handle: this.handle,
      step: step.name,
      actions: actions.length,
    });
  }

  private taskPrompt(step: WorkflowStep): string {
    const dependencies = step.dependsOn.length ? step.dependsOn.join(', ') : 'none';
    return [
      `Task: ${step.description}`,
      `Dependencies: ${dependencies}`,
      'Respond with JSON specifying tool actions to take.',
    ].join('\n');
  }

  private async beat(): Promise<void> {
    await this.emit({
      event: SpecialistEvents.HEARTBEAT,
      handle: this.handle,
      pending: this.queue.size,
      current: this.current?.name ?? null,
    });
  }
}
