import { describe, it, expect } from 'vitest';
import {
  ChannelSchema,
  RoleSpecPayloadSchema,
  TaskforceConfigSchema,
  TeamPlanPayloadSchema,
} from './types.js';

describe('ChannelSchema', () => {
  it('should accept the closed channel vocabulary', () => {
    for (const channel of ['status', 'alert', 'plan', 'artifact', 'heartbeat']) {
      expect(ChannelSchema.parse(channel)).toBe(channel);
    }
  });

  it('should reject channels outside the vocabulary', () => {
    expect(ChannelSchema.safeParse('metrics').success).toBe(false);
  });
});

describe('RoleSpecPayloadSchema', () => {
  it('should default capabilities and coerce the check-in interval', () => {
    const role = RoleSpecPayloadSchema.parse({
      handle: 'backend',
      display_name: 'Backend Engineer',
      mission: 'Build the API',
      instructions: 'Write tests first',
      check_in_seconds: '60',
    });
    expect(role.capabilities).toEqual([]);
    expect(role.check_in_seconds).toBe(60);
  });

  it('should reject a blank handle', () => {
    const result = RoleSpecPayloadSchema.safeParse({
      handle: '   ',
      display_name: 'x',
      mission: 'x',
      instructions: 'x',
    });
    expect(result.success).toBe(false);
  });
});

describe('TeamPlanPayloadSchema', () => {
  const role = (handle: string) => ({
    handle,
    display_name: handle,
    mission: 'm',
    instructions: 'i',
  });

  it('should fill in missing sections', () => {
    const plan = TeamPlanPayloadSchema.parse({});
    expect(plan).toEqual({ mission_brief: '', roles: [], workflow: [], communication: {} });
  });

  it('should reject duplicate role handles', () => {
    const result = TeamPlanPayloadSchema.safeParse({ roles: [role('qa'), role('qa')] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Duplicate role handle "qa"');
      expect(result.error.issues[0]?.path).toEqual(['roles', 1, 'handle']);
    }
  });

  it('should default step dependencies to an empty list', () => {
    const plan = TeamPlanPayloadSchema.parse({
      roles: [role('qa')],
      workflow: [{ name: 'verify', description: 'Run the suite', role: 'qa' }],
    });
    expect(plan.workflow[0]?.depends_on).toEqual([]);
  });
});

describe('TaskforceConfigSchema', () => {
  it('should provide defaults for every section', () => {
    const config = TaskforceConfigSchema.parse({});
    expect(config.planner.model).toBe('gpt-4.1-mini');
    expect(config.planner.pollIntervalMs).toBe(500);
    expect(config.bridge.args).toEqual(['cli', 'mcp']);
    expect(config.bridge.closeTimeoutMs).toBe(5000);
    expect(config.defaultCheckInSeconds).toBe(300);
    expect(config.unroutedSteps).toBe('drop');
  });

  it('should reject an unknown unrouted-step policy', () => {
    expect(TaskforceConfigSchema.safeParse({ unroutedSteps: 'retry' }).success).toBe(false);
  });
});
