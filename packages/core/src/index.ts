/**
 * @file packages/core/src/index.ts
 * @description Public entry point of the coordination fabric.
 */

import 'reflect-metadata';

export { loadConfig } from './config.js';
export { setupContainer } from './container.js';
export { Logger, silentLogger, type LoggerOptions } from './logger.js';
export * from './domain/errors/app-error.js';
export { AsyncQueue } from './infrastructure/events/async-queue.js';
export {
  MessageBus,
  Subscription,
  parseChannel,
  type SubscribeOptions,
} from './infrastructure/events/message-bus.js';
export {
  ToolBridge,
  withToolBridge,
  parseBridgeReply,
  type BridgeState,
  type ToolBridgeOptions,
} from './infrastructure/bridge/tool-bridge.js';
export {
  spawnToolProcess,
  type ProcessSpawner,
  type SpawnRequest,
  type ToolProcess,
} from './infrastructure/bridge/tool-process.js';
export {
  AssistantsPlanningClient,
  type AgentPersona,
  type PlanningClient,
  type PlanningResponse,
  type TranscriptMessage,
} from './infrastructure/llm/planning-client.js';
export {
  BridgeToolRegistry,
  createBridgeToolRegistry,
  defineBridgeTool,
  type BridgeTool,
} from './tools/registry.js';
export { BaseAgent, type AgentContext } from './domain/logic/base-agent.js';
export { Specialist, type SpecialistOptions } from './domain/logic/specialist.js';
export { Orchestrator, ORCHESTRATOR_NAME } from './domain/logic/orchestrator.js';
export { buildTeamPlan } from './domain/logic/team-plan.js';
export { extractPlanPayload, findLastJson, parseActions } from './domain/logic/transcript.js';
