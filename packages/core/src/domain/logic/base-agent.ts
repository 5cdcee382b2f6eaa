/**
 * @file packages/core/src/domain/logic/base-agent.ts
 * @description Behaviour shared by the orchestrator and its specialists: persona
 * provisioning, bus publishing and model messaging.
 */

import {
  EVENT_CHANNELS,
  type AgentDescriptor,
  type BusEventName,
  type BusMessage,
  type Channel,
  type MessagePayload,
} from '@taskforce/shared';
import { LifecycleError } from '../errors/app-error.js';
import type { Logger } from '../../logger.js';
import type { MessageBus } from '../../infrastructure/events/message-bus.js';
import { SerialLock } from '../../infrastructure/bridge/serial-lock.js';
import type {
  PlanningClient,
  PlanningResponse,
  SendMessageOptions,
} from '../../infrastructure/llm/planning-client.js';

export interface AgentContext {
  bus: MessageBus;
  planner: PlanningClient;
  logger: Logger;
}

export abstract class BaseAgent {
  protected readonly bus: MessageBus;
  protected readonly planner: PlanningClient;
  protected readonly logger: Logger;
  private agentDescriptor?: AgentDescriptor;
  private readonly bootLock = new SerialLock();

  constructor(
    readonly name: string,
    readonly role: string,
    context: AgentContext,
  ) {
    this.bus = context.bus;
    this.planner = context.planner;
    this.logger = context.logger.child({ agent: name });
  }

  get descriptor(): AgentDescriptor | undefined {
    return this.agentDescriptor;
  }

  /**
   * Provisions the agent's persona with the planning capability. Only the first call
   * does any work; concurrent callers wait for it.
   */
  boot(instructions: string, signal?: AbortSignal): Promise<AgentDescriptor> {
    return this.bootLock.runExclusive(async () => {
      if (!this.agentDescriptor) {
        this.agentDescriptor = await this.planner.createAgent(
          { name: this.name, instructions },
          signal,
        );
        this.logger.debug({ threadId: this.agentDescriptor.threadId }, 'Agent provisioned');
      }
      return this.agentDescriptor;
    });
  }

  notify<P extends MessagePayload>(channel: Channel, payload: P): Promise<BusMessage<P>> {
    return this.bus.publish({ channel, sender: this.name, payload });
  }

  /** Publishes an event on the channel its name belongs to. */
  emit<P extends MessagePayload & { event: BusEventName }>(payload: P): Promise<BusMessage<P>> {
    return this.notify(EVENT_CHANNELS[payload.event], payload);
  }

  sendModelMessage(content: string, options?: SendMessageOptions): Promise<PlanningResponse> {
    const descriptor = this.agentDescriptor;
    if (!descriptor) {
      return Promise.reject(new LifecycleError(`Agent ${this.name} is not booted`));
    }
    return this.planner.sendMessage(descriptor, content, options);
  }
}
