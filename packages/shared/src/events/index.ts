/**
 * @file packages/shared/src/events/index.ts
 * @description Event names and payload shapes carried on the message bus.
 */

import type { Channel } from '../types.js';

// Specialist lifecycle and results
export const SpecialistEvents = {
  BOOT: 'specialist_boot',
  STEP_START: 'step_start',
  STEP_COMPLETE: 'step_complete',
  ERROR: 'specialist_error',
  TOOL_ACTION: 'tool_action',
  HEARTBEAT: 'specialist_heartbeat',
} as const;

// Orchestrator
export const OrchestratorEvents = {
  PLAN_CREATED: 'plan_created',
} as const;

export type BusEventName =
  | (typeof SpecialistEvents)[keyof typeof SpecialistEvents]
  | (typeof OrchestratorEvents)[keyof typeof OrchestratorEvents];

// Aliases rather than interfaces: payloads must be assignable to MessagePayload.
export type SpecialistBootPayload = {
  event: typeof SpecialistEvents.BOOT;
  handle: string;
  workspace: string;
};

export type StepStartPayload = {
  event: typeof SpecialistEvents.STEP_START;
  handle: string;
  step: string;
  description: string;
};

export type StepCompletePayload = {
  event: typeof SpecialistEvents.STEP_COMPLETE;
  handle: string;
  step: string;
  actions: number;
};

export type SpecialistErrorPayload = {
  event: typeof SpecialistEvents.ERROR;
  handle: string;
  step: string;
  error: string;
  code: string;
};

export type ToolActionPayload = {
  event: typeof SpecialistEvents.TOOL_ACTION;
  handle: string;
  step: string;
  tool: string;
  ok: boolean;
  result: Record<string, unknown>;
  raw: string;
};

export type HeartbeatPayload = {
  event: typeof SpecialistEvents.HEARTBEAT;
  handle: string;
  pending: number;
  current: string | null;
};

export type PlanCreatedPayload = {
  event: typeof OrchestratorEvents.PLAN_CREATED;
  plan: Record<string, unknown>;
};

/** Which channel each event travels on. */
export const EVENT_CHANNELS: Record<BusEventName, Channel> = {
  [SpecialistEvents.BOOT]: 'status',
  [SpecialistEvents.STEP_START]: 'status',
  [SpecialistEvents.STEP_COMPLETE]: 'status',
  [SpecialistEvents.ERROR]: 'alert',
  [SpecialistEvents.TOOL_ACTION]: 'artifact',
  [SpecialistEvents.HEARTBEAT]: 'heartbeat',
  [OrchestratorEvents.PLAN_CREATED]: 'plan',
};
