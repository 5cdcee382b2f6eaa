/**
 * @file packages/shared/src/types.ts
 * @description Defines module behavior for the Taskforce workspace.
 */

import { z } from 'zod';
import {
  DEFAULT_BRIDGE_CLOSE_TIMEOUT_MS,
  DEFAULT_CHECK_IN_SECONDS,
  MAX_CHECK_IN_SECONDS,
} from './constants.js';

// ─── Channels ─────────────────────────────────────────────────

export const ChannelSchema = z.enum(['status', 'alert', 'plan', 'artifact', 'heartbeat']);
export type Channel = z.infer<typeof ChannelSchema>;

export const CHANNELS: readonly Channel[] = ChannelSchema.options;

// ─── Bus Messages ─────────────────────────────────────────────

export type MessagePayload = Record<string, unknown>;

export interface OutgoingMessage<P extends MessagePayload = MessagePayload> {
  channel: Channel;
  sender: string;
  payload: P;
}

export interface BusMessage<P extends MessagePayload = MessagePayload> {
  readonly id: string;
  readonly channel: Channel;
  readonly sender: string;
  readonly payload: Readonly<P>;
  readonly timestamp: number;
}

// ─── Plan Payloads (wire format from the planning capability) ─

export const RoleSpecPayloadSchema = z.object({
  handle: z.string().trim().min(1),
  display_name: z.string(),
  mission: z.string(),
  instructions: z.string(),
  check_in_seconds: z.coerce.number().int().positive().max(MAX_CHECK_IN_SECONDS).optional(),
  capabilities: z.array(z.string()).default([]),
});
export type RoleSpecPayload = z.infer<typeof RoleSpecPayloadSchema>;

export const WorkflowStepPayloadSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  role: z.string(),
  depends_on: z.array(z.string()).default([]),
});
export type WorkflowStepPayload = z.infer<typeof WorkflowStepPayloadSchema>;

export const TeamPlanPayloadSchema = z
  .object({
    mission_brief: z.string().default(''),
    roles: z.array(RoleSpecPayloadSchema).default([]),
    workflow: z.array(WorkflowStepPayloadSchema).default([]),
    // Normalized leniently by the plan builder.
    communication: z
      .object({
        interval_seconds: z.unknown(),
        channels: z.unknown(),
      })
      .partial()
      .default({}),
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.roles.forEach((role, index) => {
      if (seen.has(role.handle)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['roles', index, 'handle'],
          message: `Duplicate role handle "${role.handle}"`,
        });
      }
      seen.add(role.handle);
    });
  });
export type TeamPlanPayload = z.infer<typeof TeamPlanPayloadSchema>;

// ─── Plan (domain) ────────────────────────────────────────────

export interface RoleSpec {
  handle: string;
  displayName: string;
  mission: string;
  instructions: string;
  checkInSeconds: number;
  capabilities: string[];
}

export interface WorkflowStep {
  name: string;
  description: string;
  /** Handle of the role the step is routed to. */
  role: string;
  dependsOn: string[];
}

export interface CommunicationRule {
  intervalSeconds: number;
  channels: Channel[];
}

export interface TeamPlan {
  missionBrief: string;
  roles: RoleSpec[];
  workflow: WorkflowStep[];
  communication: CommunicationRule;
}

// ─── Actions ──────────────────────────────────────────────────

export const PlannedActionSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});
export type PlannedAction = z.infer<typeof PlannedActionSchema>;

export const ActionListPayloadSchema = z.object({
  actions: z.array(z.unknown()),
});

// ─── Sessions ─────────────────────────────────────────────────

export const ToolSessionSchema = z.object({
  workspace: z.string().min(1),
  agentName: z.string().min(1),
});
export type ToolSession = z.infer<typeof ToolSessionSchema>;

export interface AgentDescriptor {
  assistantId: string;
  threadId: string;
  name: string;
  role: string;
}

// ─── Configuration ────────────────────────────────────────────

export const UnroutedStepPolicySchema = z.enum(['drop', 'error', 'defer']);
export type UnroutedStepPolicy = z.infer<typeof UnroutedStepPolicySchema>;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const PlannerConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:4000/'),
  apiKey: z.string().default('dummy-key'),
  model: z.string().default('gpt-4.1-mini'),
  customProvider: z.string().default('openai'),
  pollIntervalMs: z.number().int().positive().default(500),
  runTimeoutMs: z.number().int().positive().default(300_000),
});
export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

export const BridgeConfigSchema = z.object({
  binaryPath: z.string().default('codex'),
  args: z.array(z.string()).default(['cli', 'mcp']),
  workspaceRoot: z.string().default('./workspaces'),
  agentEnvVar: z.string().default('CODEX_AGENT_NAME'),
  closeTimeoutMs: z.number().int().positive().default(DEFAULT_BRIDGE_CLOSE_TIMEOUT_MS),
});
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export const DEFAULT_ORCHESTRATOR_PROMPT =
  'You are the orchestrator of a tool-driving development team. Gather requirements, ' +
  'design workflows, assign specialists to each role, and deliver results with clear reports.';

export const TaskforceConfigSchema = z.object({
  planner: PlannerConfigSchema.default({}),
  orchestratorPrompt: z.string().default(DEFAULT_ORCHESTRATOR_PROMPT),
  defaultCheckInSeconds: z
    .number()
    .int()
    .positive()
    .max(MAX_CHECK_IN_SECONDS)
    .default(DEFAULT_CHECK_IN_SECONDS),
  bridge: BridgeConfigSchema.default({}),
  unroutedSteps: UnroutedStepPolicySchema.default('drop'),
  logLevel: LogLevelSchema.default('info'),
  logPretty: z.boolean().default(false),
});
export type TaskforceConfig = z.infer<typeof TaskforceConfigSchema>;
