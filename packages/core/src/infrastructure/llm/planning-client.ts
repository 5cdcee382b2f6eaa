/**
 * @file packages/core/src/infrastructure/llm/planning-client.ts
 * @description Planning capability used by agents: provisions a persona and exchanges
 * messages with it through an OpenAI-compatible Assistants endpoint.
 */

import { setTimeout as delay } from 'node:timers/promises';
import OpenAI from 'openai';
import { inject, injectable } from 'tsyringe';
import type { AgentDescriptor, TaskforceConfig } from '@taskforce/shared';
import { PlanningError } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

export interface AgentPersona {
  name: string;
  instructions: string;
}

export interface TranscriptItem {
  type: string;
  text?: string;
}

export interface TranscriptMessage {
  role: string;
  content: TranscriptItem[];
}

export interface PlanningResponse {
  runStatus: string;
  /** Thread messages, oldest first. */
  messages: TranscriptMessage[];
}

export interface SendMessageOptions {
  metadata?: Record<string, string>;
  signal?: AbortSignal;
}

export interface PlanningClient {
  createAgent(persona: AgentPersona, signal?: AbortSignal): Promise<AgentDescriptor>;
  sendMessage(
    descriptor: AgentDescriptor,
    content: string,
    options?: SendMessageOptions,
  ): Promise<PlanningResponse>;
}

const TERMINAL_RUN_STATES = new Set(['completed', 'failed', 'cancelled', 'expired', 'incomplete']);

/** The parts of a thread message the transcript keeps. */
export interface ThreadMessageLike {
  role: string;
  /** Run that produced the message; `null` for messages posted by the caller. */
  run_id: string | null;
  content: ReadonlyArray<{ type: string; text?: { value: string } }>;
}

export function toTranscript(messages: readonly ThreadMessageLike[]): TranscriptMessage[] {
  return messages.map((message) => ({
    role: message.role,
    content: message.content.map((block) =>
      block.type === 'text' && block.text
        ? { type: 'output_text', text: block.text.value }
        : { type: block.type },
    ),
  }));
}

/**
 * Transcript of one exchange: only the messages `runId` produced, oldest first. A run
 * that failed before answering yields an empty transcript, never an earlier turn's reply.
 */
export function runTranscript(
  messages: readonly ThreadMessageLike[],
  runId: string,
): TranscriptMessage[] {
  return toTranscript(messages.filter((message) => message.run_id === runId));
}

/** Short role label: first line of the instructions. */
export function personaRole(instructions: string): string {
  return instructions.split('\n', 1)[0].slice(0, 64);
}

@injectable()
export class AssistantsPlanningClient implements PlanningClient {
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(
    @inject('AppConfig') private readonly config: TaskforceConfig,
    @inject(Logger) logger: Logger,
  ) {
    this.client = new OpenAI({
      baseURL: config.planner.baseUrl,
      apiKey: config.planner.apiKey,
    });
    this.logger = logger.child({ component: 'planning-client' });
  }

  async createAgent(persona: AgentPersona, signal?: AbortSignal): Promise<AgentDescriptor> {
    const { model, customProvider } = this.config.planner;
    // Extra body field understood by LiteLLM proxies.
    const params: Parameters<OpenAI['beta']['assistants']['create']>[0] & {
      custom_llm_provider?: string;
    } = {
      model,
      name: persona.name,
      instructions: persona.instructions,
      tools: [],
    };
    if (customProvider) {
      params.custom_llm_provider = customProvider;
    }

    const assistant = await this.client.beta.assistants.create(params, { signal });
    const thread = await this.client.beta.threads.create({}, { signal });
    this.logger.debug({ assistantId: assistant.id, threadId: thread.id }, `Provisioned ${persona.name}`);

    return {
      assistantId: assistant.id,
      threadId: thread.id,
      name: persona.name,
      role: personaRole(persona.instructions),
    };
  }

  async sendMessage(
    descriptor: AgentDescriptor,
    content: string,
    options: SendMessageOptions = {},
  ): Promise<PlanningResponse> {
    const { signal, metadata } = options;
    const { threadId, assistantId } = descriptor;

    await this.client.beta.threads.messages.create(
      threadId,
      { role: 'user', content, metadata },
      { signal },
    );
    let run = await this.client.beta.threads.runs.create(
      threadId,
      { assistant_id: assistantId },
      { signal },
    );

    const { pollIntervalMs, runTimeoutMs } = this.config.planner;
    const deadline = Date.now() + runTimeoutMs;
    while (!TERMINAL_RUN_STATES.has(run.status)) {
      if (Date.now() >= deadline) {
        throw new PlanningError(
          `Planning run ${run.id} for ${descriptor.name} did not finish within ${runTimeoutMs}ms`,
        );
      }
      await delay(pollIntervalMs, undefined, { signal });
      run = await this.client.beta.threads.runs.retrieve(threadId, run.id, { signal });
    }

    if (run.status !== 'completed') {
      this.logger.warn(
        { runId: run.id, status: run.status, agent: descriptor.name },
        'Planning run ended without completing',
      );
    }

    const messages: ThreadMessageLike[] = [];
    for await (const message of this.client.beta.threads.messages.list(
      threadId,
      { order: 'asc', run_id: run.id },
      { signal },
    )) {
      messages.push(message);
    }

    return { runStatus: run.status, messages: runTranscript(messages, run.id) };
  }
}
