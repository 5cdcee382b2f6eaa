/**
 * @file packages/shared/src/protocol.ts
 * @description Line-delimited JSON protocol spoken with tool-execution processes.
 */

import { z } from 'zod';

// ─── Request Line ─────────────────────────────────────────────

export const BridgeRequestSchema = z.object({
  tool: z.string().min(1),
  kwargs: z.record(z.unknown()),
});
export type BridgeRequest = z.infer<typeof BridgeRequestSchema>;

// ─── Reply Line ───────────────────────────────────────────────

export const BridgeReplySchema = z
  .object({
    ok: z.unknown().optional(),
  })
  .passthrough();
export type BridgeReply = z.infer<typeof BridgeReplySchema>;

export interface BridgeResponse {
  ok: boolean;
  data: Record<string, unknown>;
  raw: string;
}

// ─── Helpers ──────────────────────────────────────────────────

/**
 * Serializes a request as exactly one newline-terminated JSON line.
 */
export function serializeBridgeRequest(request: BridgeRequest): string {
  return `${JSON.stringify(BridgeRequestSchema.parse(request))}\n`;
}

/**
 * Converts a validated reply into a response; `ok` follows JSON truthiness.
 */
export function toBridgeResponse(reply: BridgeReply, raw: string): BridgeResponse {
  return {
    ok: Boolean(reply.ok),
    data: { ...reply },
    raw,
  };
}
