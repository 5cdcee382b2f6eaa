import { describe, it, expect } from 'vitest';
import { TaskforceConfigSchema } from '@taskforce/shared';
import { setupContainer } from './container.js';
import { Orchestrator } from './domain/logic/orchestrator.js';
import { MessageBus } from './infrastructure/events/message-bus.js';
import { AssistantsPlanningClient } from './infrastructure/llm/planning-client.js';
import { ScriptedPlanningClient } from './testing/fake-planning-client.js';

describe('setupContainer', () => {
  const config = TaskforceConfigSchema.parse({ logLevel: 'silent' });

  it('resolves the orchestrator with the Assistants planning client by default', () => {
    const scope = setupContainer(config);

    expect(scope.resolve(Orchestrator)).toBe(scope.resolve(Orchestrator));
    expect(scope.resolve('PlanningClient')).toBeInstanceOf(AssistantsPlanningClient);
    expect(scope.resolve('AppConfig')).toBe(config);
  });

  it('gives each runtime its own bus', () => {
    expect(setupContainer(config).resolve(MessageBus)).not.toBe(
      setupContainer(config).resolve(MessageBus),
    );
  });

  it('lets a collaborator be swapped before resolution', async () => {
    const scope = setupContainer(config);
    const planner = new ScriptedPlanningClient();
    scope.register('PlanningClient', { useValue: planner });

    await scope.resolve(Orchestrator).start();

    expect(planner.personas.map((p) => p.name)).toEqual(['orchestrator']);
    expect(planner.personas[0].instructions).toBe(config.orchestratorPrompt);
  });
});
