/**
 * @file packages/core/src/domain/logic/transcript.ts
 * @description Pulls structured payloads out of planning transcripts.
 */

import { PlannedActionSchema, type PlannedAction } from '@taskforce/shared';
import { ActionValidationError, PlanExtractionError } from '../errors/app-error.js';
import type { TranscriptMessage } from '../../infrastructure/llm/planning-client.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scans messages newest first (items within a message in order) and returns the first
 * `output_text` item that parses as a JSON object accepted by `accept`.
 */
export function findLastJson(
  messages: readonly TranscriptMessage[],
  accept: (value: Record<string, unknown>) => boolean = () => true,
): Record<string, unknown> | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    for (const item of messages[i].content) {
      if (item.type !== 'output_text' || item.text === undefined) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(item.text);
      } catch {
        continue;
      }
      if (isRecord(parsed) && accept(parsed)) {
        return parsed;
      }
    }
  }
  return undefined;
}

export function extractPlanPayload(messages: readonly TranscriptMessage[]): Record<string, unknown> {
  const payload = findLastJson(messages);
  if (!payload) {
    throw new PlanExtractionError();
  }
  return payload;
}

/**
 * Action list from the newest `{"actions": [...]}` object. No such object means no actions.
 */
export function parseActions(messages: readonly TranscriptMessage[]): PlannedAction[] {
  const payload = findLastJson(messages, (value) => Array.isArray(value.actions));
  if (!payload || !Array.isArray(payload.actions)) {
    return [];
  }

  return payload.actions.map((entry: unknown, index) => {
    const action = PlannedActionSchema.safeParse(entry);
    if (!action.success) {
      throw new ActionValidationError(
        `Action #${index + 1} is not a {tool, arguments} object: ${JSON.stringify(entry)}`,
      );
    }
    return action.data;
  });
}
