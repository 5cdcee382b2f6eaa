/**
 * @file packages/core/src/testing/fake-planning-client.ts
 * @description Scripted planning capability for tests. Threads accumulate every turn,
 * as they do on an Assistants endpoint.
 */

import type { AgentDescriptor } from '@taskforce/shared';
import {
  personaRole,
  runTranscript,
  type AgentPersona,
  type PlanningClient,
  type PlanningResponse,
  type SendMessageOptions,
  type ThreadMessageLike,
} from '../infrastructure/llm/planning-client.js';

/** A run ending in `runStatus`, answering with `text` if given. */
export interface ScriptedRun {
  runStatus: string;
  text?: string;
}

/**
 * Reply text, an error to throw, a handler producing the reply text, or a run outcome.
 */
export type ScriptedReply =
  | string
  | Error
  | ScriptedRun
  | ((content: string, signal?: AbortSignal) => Promise<string>);

export interface RecordedPrompt {
  agent: string;
  content: string;
  metadata?: Record<string, string>;
}

export class ScriptedPlanningClient implements PlanningClient {
  readonly personas: AgentPersona[] = [];
  readonly prompts: RecordedPrompt[] = [];
  private readonly scripts = new Map<string, ScriptedReply[]>();
  private readonly threads = new Map<string, ThreadMessageLike[]>();
  private runs = 0;

  /** Reply used once an agent's script runs out. */
  constructor(private readonly fallback = '{"actions":[]}') {}

  script(agent: string, ...replies: ScriptedReply[]): this {
    const queue = this.scripts.get(agent) ?? [];
    queue.push(...replies);
    this.scripts.set(agent, queue);
    return this;
  }

  /** Every message posted to or produced on the agent's thread so far. */
  thread(agent: string): readonly ThreadMessageLike[] {
    return this.threads.get(`thread_${agent}`) ?? [];
  }

  async createAgent(persona: AgentPersona): Promise<AgentDescriptor> {
    this.personas.push(persona);
    return {
      assistantId: `asst_${persona.name}`,
      threadId: `thread_${persona.name}`,
      name: persona.name,
      role: personaRole(persona.instructions),
    };
  }

  async sendMessage(
    descriptor: AgentDescriptor,
    content: string,
    options: SendMessageOptions = {},
  ): Promise<PlanningResponse> {
    this.prompts.push({ agent: descriptor.name, content, metadata: options.metadata });

    const thread = this.threads.get(descriptor.threadId) ?? [];
    this.threads.set(descriptor.threadId, thread);
    thread.push({ role: 'user', run_id: null, content: [{ type: 'text', text: { value: content } }] });

    const reply = this.scripts.get(descriptor.name)?.shift() ?? this.fallback;
    if (reply instanceof Error) {
      throw reply;
    }
    const run: ScriptedRun =
      typeof reply === 'string'
        ? { runStatus: 'completed', text: reply }
        : typeof reply === 'function'
          ? { runStatus: 'completed', text: await reply(content, options.signal) }
          : reply;

    const runId = `run_${++this.runs}`;
    if (run.text !== undefined) {
      thread.push({
        role: 'assistant',
        run_id: runId,
        content: [{ type: 'text', text: { value: run.text } }],
      });
    }

    return { runStatus: run.runStatus, messages: runTranscript(thread, runId) };
  }
}
