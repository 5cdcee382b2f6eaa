/**
 * @file packages/core/src/container.ts
 * @description Dependency-injection wiring for one configured runtime.
 */

import 'reflect-metadata';
import { container, Lifecycle, type DependencyContainer } from 'tsyringe';
import type { TaskforceConfig } from '@taskforce/shared';
import { Logger } from './logger.js';
import { MessageBus } from './infrastructure/events/message-bus.js';
import { spawnToolProcess } from './infrastructure/bridge/tool-process.js';
import { AssistantsPlanningClient } from './infrastructure/llm/planning-client.js';
import { BridgeToolRegistry, createBridgeToolRegistry } from './tools/registry.js';
import { Orchestrator } from './domain/logic/orchestrator.js';

/**
 * Builds a child container holding everything configured by `config`. Each call gets
 * its own bus, logger and orchestrator.
 */
export function setupContainer(config: TaskforceConfig): DependencyContainer {
  const scope = container.createChildContainer();

  scope.register('AppConfig', { useValue: config });
  scope.register(Logger, {
    useValue: new Logger({ level: config.logLevel, pretty: config.logPretty }),
  });
  scope.register(MessageBus, { useValue: new MessageBus() });

  // Collaborators behind interface tokens
  scope.register('ProcessSpawner', { useValue: spawnToolProcess });
  scope.register(
    'PlanningClient',
    { useClass: AssistantsPlanningClient },
    { lifecycle: Lifecycle.ContainerScoped },
  );
  scope.register(BridgeToolRegistry, { useValue: createBridgeToolRegistry() });

  scope.register(Orchestrator, { useClass: Orchestrator }, { lifecycle: Lifecycle.ContainerScoped });

  return scope;
}

export { container };
