import { describe, it, expect } from 'vitest';
import type { TranscriptMessage } from '../../infrastructure/llm/planning-client.js';
import { PlanValidationError } from '../errors/app-error.js';
import { buildTeamPlan } from './team-plan.js';
import { extractPlanPayload } from './transcript.js';

const options = { defaultCheckInSeconds: 300 };

describe('buildTeamPlan', () => {
  it('defaults the communication rule of a minimal plan', () => {
    const messages: TranscriptMessage[] = [
      { role: 'assistant', content: [{ type: 'output_text', text: 'not json' }] },
      {
        role: 'assistant',
        content: [
          {
            type: 'output_text',
            text: '{"mission_brief":"x","roles":[],"workflow":[],"communication":{}}',
          },
        ],
      },
    ];

    const plan = buildTeamPlan(extractPlanPayload(messages), options);

    expect(plan).toEqual({
      missionBrief: 'x',
      roles: [],
      workflow: [],
      communication: { intervalSeconds: 300, channels: ['status'] },
    });
  });

  it('maps roles and steps to the domain shape', () => {
    const plan = buildTeamPlan(
      {
        mission_brief: 'Ship the parser',
        roles: [
          {
            handle: 'dev',
            display_name: 'Developer',
            mission: 'Write code',
            instructions: 'Be careful',
            capabilities: ['execution', 'execution', 'review'],
          },
          {
            handle: 'qa',
            display_name: 'Tester',
            mission: 'Test code',
            instructions: 'Be thorough',
            check_in_seconds: '60',
          },
        ],
        workflow: [
          { name: 'build', description: 'Build it', role: 'dev' },
          { name: 'verify', description: 'Test it', role: 'qa', depends_on: ['build'] },
        ],
        communication: { interval_seconds: 120, channels: ['status', 'artifact'] },
      },
      options,
    );

    expect(plan.roles).toEqual([
      {
        handle: 'dev',
        displayName: 'Developer',
        mission: 'Write code',
        instructions: 'Be careful',
        checkInSeconds: 300,
        capabilities: ['execution', 'review'],
      },
      {
        handle: 'qa',
        displayName: 'Tester',
        mission: 'Test code',
        instructions: 'Be thorough',
        checkInSeconds: 60,
        capabilities: [],
      },
    ]);
    expect(plan.workflow).toEqual([
      { name: 'build', description: 'Build it', role: 'dev', dependsOn: [] },
      { name: 'verify', description: 'Test it', role: 'qa', dependsOn: ['build'] },
    ]);
    expect(plan.communication).toEqual({ intervalSeconds: 120, channels: ['status', 'artifact'] });
  });

  it('drops unknown channels and falls back to status when none remain', () => {
    const plan = buildTeamPlan(
      { communication: { interval_seconds: 'soon', channels: ['gossip'] } },
      options,
    );
    expect(plan.communication).toEqual({ intervalSeconds: 300, channels: ['status'] });
  });

  it('treats a non-list channel value as missing', () => {
    const plan = buildTeamPlan({ communication: { channels: 'alert' } }, { defaultCheckInSeconds: 45 });
    expect(plan.communication).toEqual({ intervalSeconds: 45, channels: ['status'] });
  });

  it('rejects duplicate role handles', () => {
    const role = { handle: 'dev', display_name: 'Dev', mission: '', instructions: '' };
    expect(() => buildTeamPlan({ roles: [role, role] }, options)).toThrow(
      'Invalid plan payload: roles.1.handle: Duplicate role handle "dev"',
    );
  });

  it('rejects a check-in interval longer than a timer can hold', () => {
    const role = {
      handle: 'dev',
      display_name: 'Dev',
      mission: '',
      instructions: '',
      check_in_seconds: 3_000_000,
    };
    expect(() => buildTeamPlan({ roles: [role] }, options)).toThrow(
      'Invalid plan payload: roles.0.check_in_seconds: Number must be less than or equal to 2147483',
    );
  });

  it('rejects a role without a handle', () => {
    expect(() =>
      buildTeamPlan({ roles: [{ display_name: 'Dev', mission: '', instructions: '' }] }, options),
    ).toThrow(PlanValidationError);
  });
});
