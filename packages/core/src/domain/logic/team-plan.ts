/**
 * @file packages/core/src/domain/logic/team-plan.ts
 * @description Normalizes a raw plan payload into a TeamPlan.
 */

import {
  ChannelSchema,
  TeamPlanPayloadSchema,
  type Channel,
  type CommunicationRule,
  type TeamPlan,
} from '@taskforce/shared';
import { PlanValidationError } from '../errors/app-error.js';
import { Logger, silentLogger } from '../../logger.js';

export interface BuildTeamPlanOptions {
  /** Used for roles without a check-in interval and for a missing communication interval. */
  defaultCheckInSeconds: number;
  logger?: Logger;
}

export function buildTeamPlan(payload: unknown, options: BuildTeamPlanOptions): TeamPlan {
  const logger = options.logger ?? silentLogger;
  const result = TeamPlanPayloadSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PlanValidationError(`Invalid plan payload: ${issues.join('; ')}`, issues);
  }
  const data = result.data;

  return {
    missionBrief: data.mission_brief,
    roles: data.roles.map((role) => ({
      handle: role.handle,
      displayName: role.display_name,
      mission: role.mission,
      instructions: role.instructions,
      checkInSeconds: role.check_in_seconds ?? options.defaultCheckInSeconds,
      capabilities: [...new Set(role.capabilities)],
    })),
    workflow: data.workflow.map((step) => ({
      name: step.name,
      description: step.description,
      role: step.role,
      dependsOn: step.depends_on,
    })),
    communication: normalizeCommunication(data.communication, options.defaultCheckInSeconds, logger),
  };
}

function normalizeCommunication(
  raw: { interval_seconds?: unknown; channels?: unknown },
  defaultInterval: number,
  logger: Logger,
): CommunicationRule {
  const channels: Channel[] = [];
  if (Array.isArray(raw.channels)) {
    for (const value of raw.channels) {
      const channel = ChannelSchema.safeParse(value);
      if (!channel.success) {
        logger.warn({ channel: value }, 'Ignoring unknown channel in plan');
        continue;
      }
      if (!channels.includes(channel.data)) {
        channels.push(channel.data);
      }
    }
  }

  return {
    intervalSeconds: toInterval(raw.interval_seconds) ?? defaultInterval,
    channels: channels.length > 0 ? channels : ['status'],
  };
}

function toInterval(value: unknown): number | undefined {
  if (typeof value !== 'number' && typeof value !== 'string') return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  const seconds = Math.trunc(Number(value));
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}
