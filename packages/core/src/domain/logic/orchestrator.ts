/**
 * @file packages/core/src/domain/logic/orchestrator.ts
 * @description Coordinator agent: turns a goal into a TeamPlan, staffs one specialist
 * per role, routes workflow steps and keeps a live view of status and alerts.
 */

import { join } from 'node:path';
import { inject, injectable } from 'tsyringe';
import {
  OrchestratorEvents,
  ToolSessionSchema,
  type BusMessage,
  type Channel,
  type MessagePayload,
  type RoleSpec,
  type TaskforceConfig,
  type TeamPlan,
  type ToolSession,
  type WorkflowStep,
} from '@taskforce/shared';
import { LifecycleError, UnroutedStepError } from '../errors/app-error.js';
import { Logger } from '../../logger.js';
import { MessageBus } from '../../infrastructure/events/message-bus.js';
import type { ProcessSpawner } from '../../infrastructure/bridge/tool-process.js';
import type { PlanningClient } from '../../infrastructure/llm/planning-client.js';
import { BridgeToolRegistry } from '../../tools/registry.js';
import { BaseAgent } from './base-agent.js';
import { Specialist } from './specialist.js';
import { buildTeamPlan } from './team-plan.js';
import { extractPlanPayload } from './transcript.js';

export const ORCHESTRATOR_NAME = 'orchestrator';

@injectable()
export class Orchestrator extends BaseAgent {
  private plan?: TeamPlan;
  private readonly specialists = new Map<string, Specialist>();
  private deferred: WorkflowStep[] = [];
  private readonly statuses = new Map<string, Readonly<MessagePayload>>();
  private readonly alertLog: Array<Readonly<MessagePayload>> = [];
  private supervision?: AbortController;
  private monitors: Promise<void>[] = [];

  constructor(
    @inject('AppConfig') private readonly config: TaskforceConfig,
    @inject(MessageBus) bus: MessageBus,
    @inject('PlanningClient') planner: PlanningClient,
    @inject(BridgeToolRegistry) private readonly tools: BridgeToolRegistry,
    @inject('ProcessSpawner') private readonly spawn: ProcessSpawner,
    @inject(Logger) logger: Logger,
  ) {
    super(ORCHESTRATOR_NAME, 'System Orchestrator', { bus, planner, logger });
  }

  get currentPlan(): TeamPlan | undefined {
    return this.plan;
  }

  async start(signal?: AbortSignal): Promise<void> {
    await this.boot(this.config.orchestratorPrompt, signal);
  }

  /**
   * Asks the planning capability for a plan and publishes the raw payload on `plan`.
   */
  async handleGoal(goal: string, signal?: AbortSignal): Promise<TeamPlan> {
    const response = await this.sendModelMessage(
      'You are designing a multi-agent tool workflow. ' +
        'Return a compact JSON object with keys mission_brief, roles, workflow, communication. ' +
        `User goal: ${goal}`,
      { signal },
    );
    const payload = extractPlanPayload(response.messages);
    const plan = buildTeamPlan(payload, {
      defaultCheckInSeconds: this.config.defaultCheckInSeconds,
      logger: this.logger,
    });
    this.plan = plan;

    await this.emit({ event: OrchestratorEvents.PLAN_CREATED, plan: payload });
    this.logger.info(
      { roles: plan.roles.length, steps: plan.workflow.length },
      'Plan created',
    );
    return plan;
  }

  /**
   * Full pipeline for one goal: plan, supervise, staff, route.
   */
  async orchestrate(goal: string, signal?: AbortSignal): Promise<TeamPlan> {
    const plan = await this.handleGoal(goal, signal);
    // Listeners go up before any specialist boots so no lifecycle event is missed.
    this.ensureSupervision();
    await this.spinUpSpecialists();
    this.assignWorkflow();
    return plan;
  }

  /**
   * Creates and starts a specialist for every role without one. Existing handles are
   * skipped; new specialists boot concurrently.
   */
  async spinUpSpecialists(): Promise<void> {
    const plan = this.requirePlan('spinning up specialists');

    const created: Specialist[] = [];
    for (const spec of plan.roles) {
      if (this.specialists.has(spec.handle)) continue;
      const specialist = new Specialist({
        spec,
        session: this.createToolSession(spec),
        tools: this.tools,
        bridge: {
          command: this.config.bridge.binaryPath,
          args: this.config.bridge.args,
          agentEnvVar: this.config.bridge.agentEnvVar,
          closeTimeoutMs: this.config.bridge.closeTimeoutMs,
          spawn: this.spawn,
        },
        bus: this.bus,
        planner: this.planner,
        logger: this.logger,
      });
      this.specialists.set(spec.handle, specialist);
      created.push(specialist);
    }

    await Promise.all(created.map((specialist) => specialist.start()));

    if (this.deferred.length === 0) return;
    const held = this.deferred;
    this.deferred = [];
    for (const step of held) {
      const specialist = this.specialists.get(step.role);
      if (specialist) specialist.receiveStep(step);
      else this.deferred.push(step);
    }
  }

  /**
   * Routes every workflow step to the specialist whose handle equals the step's role.
   * Steps for unknown roles follow the `unroutedSteps` policy.
   */
  assignWorkflow(): void {
    const plan = this.requirePlan('assigning workflow');

    for (const step of plan.workflow) {
      const specialist = this.specialists.get(step.role);
      if (specialist) {
        specialist.receiveStep(step);
        continue;
      }

      switch (this.config.unroutedSteps) {
        case 'drop':
          this.logger.debug({ step: step.name, role: step.role }, 'Dropping unrouted step');
          break;
        case 'error':
          throw new UnroutedStepError(step.name, step.role);
        case 'defer':
          this.deferred.push(step);
          break;
      }
    }
  }

  createToolSession(spec: RoleSpec): ToolSession {
    return ToolSessionSchema.parse({
      workspace: join(this.config.bridge.workspaceRoot, spec.handle),
      agentName: spec.handle,
    });
  }

  /** Registers the status and alert listeners once. */
  ensureSupervision(): void {
    if (this.supervision) return;
    this.supervision = new AbortController();
    const { signal } = this.supervision;
    this.monitors = [this.monitor('status', signal), this.monitor('alert', signal)];
  }

  latestStatus(): Map<string, Readonly<MessagePayload>> {
    return new Map(this.statuses);
  }

  alerts(): Array<Readonly<MessagePayload>> {
    return [...this.alertLog];
  }

  specialist(handle: string): Specialist | undefined {
    return this.specialists.get(handle);
  }

  /** Steps held for roles that have no specialist yet, in arrival order. */
  deferredSteps(): WorkflowStep[] {
    return [...this.deferred];
  }

  /**
   * Stops supervision, waits for both listeners to finish, then stops and releases every
   * specialist.
   */
  async shutdown(): Promise<void> {
    this.supervision?.abort();
    await Promise.all(this.monitors);
    this.monitors = [];
    this.supervision = undefined;

    const staffed = [...this.specialists.values()];
    // Stopped specialists cannot be restarted; a later orchestrate() staffs afresh.
    this.specialists.clear();
    await Promise.all(staffed.map((specialist) => specialist.stop()));
    this.logger.info('Orchestrator shut down');
  }

  private monitor(channel: Channel, signal: AbortSignal): Promise<void> {
    const subscription = this.bus.subscribe(channel, { signal });
    return this.consume(subscription, (message) => this.record(message)).catch((err: unknown) => {
      this.logger.error({ err, channel }, 'Supervision listener failed');
    });
  }

  private async consume(
    messages: AsyncIterable<BusMessage>,
    handler: (message: BusMessage) => void,
  ): Promise<void> {
    for await (const message of messages) {
      handler(message);
    }
  }

  private record(message: BusMessage): void {
    if (message.channel === 'status') {
      this.statuses.set(message.sender, message.payload);
    } else if (message.channel === 'alert') {
      this.alertLog.push(message.payload);
    }
  }

  private requirePlan(action: string): TeamPlan {
    if (!this.plan) {
      throw new LifecycleError(`Plan must exist before ${action}`);
    }
    return this.plan;
  }
}
