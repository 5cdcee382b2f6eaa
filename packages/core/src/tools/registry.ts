/**
 * @file packages/core/src/tools/registry.ts
 * @description Lookup table from tool names to typed handlers over a tool bridge.
 */

import { z } from 'zod';
import type { BridgeResponse, PlannedAction } from '@taskforce/shared';
import { ActionValidationError, UnknownToolError } from '../domain/errors/app-error.js';
import type { ToolBridge } from '../infrastructure/bridge/tool-bridge.js';

// ─── Tool Definition ──────────────────────────────────────────

export interface BridgeTool {
  name: string;
  description: string;
  parameters: z.AnyZodObject;
  invoke: (
    bridge: ToolBridge,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ) => Promise<BridgeResponse>;
}

/**
 * Binds a typed handler to its argument schema; arguments are validated before the
 * handler runs.
 */
export function defineBridgeTool<S extends z.ZodRawShape>(definition: {
  name: string;
  description: string;
  parameters: z.ZodObject<S>;
  invoke: (
    bridge: ToolBridge,
    args: z.infer<z.ZodObject<S>>,
    signal?: AbortSignal,
  ) => Promise<BridgeResponse>;
}): BridgeTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    invoke: (bridge, args, signal) => {
      const parsed = definition.parameters.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new ActionValidationError(
          `Invalid arguments for tool "${definition.name}": ${issues.join('; ')}`,
        );
      }
      return definition.invoke(bridge, parsed.data, signal);
    },
  };
}

// ─── Tool Registry ────────────────────────────────────────────

export class BridgeToolRegistry {
  private tools = new Map<string, BridgeTool>();

  register(tool: BridgeTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): BridgeTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Runs one planned action against an open bridge.
   */
  async dispatch(
    bridge: ToolBridge,
    action: PlannedAction,
    signal?: AbortSignal,
  ): Promise<BridgeResponse> {
    const tool = this.tools.get(action.tool);
    if (!tool) {
      throw new UnknownToolError(action.tool);
    }
    return tool.invoke(bridge, action.arguments, signal);
  }

  /**
   * Catalogue embedded in specialist instructions so the model knows what it may call.
   */
  describe(): string {
    return Array.from(this.tools.values())
      .map((tool) => {
        const args = Object.keys(tool.parameters.shape).join(', ');
        return `- ${tool.name}(${args}): ${tool.description}`;
      })
      .join('\n');
  }
}

// ─── Defaults ─────────────────────────────────────────────────

const text = (description: string) => z.string().default('').describe(description);

export const runCommandTool = defineBridgeTool({
  name: 'run_command',
  description: 'Run a shell command inside the workspace.',
  parameters: z.object({ command: text('Command line to execute') }),
  invoke: (bridge, { command }, signal) => bridge.runCommand(command, signal),
});

export const readFileTool = defineBridgeTool({
  name: 'read_file',
  description: 'Read a file relative to the workspace.',
  parameters: z.object({ path: text('File path') }),
  invoke: (bridge, { path }, signal) => bridge.readFile(path, signal),
});

export const applyPatchTool = defineBridgeTool({
  name: 'apply_patch',
  description: 'Apply a patch to a file in the workspace.',
  parameters: z.object({ path: text('File path'), patch: text('Patch body') }),
  invoke: (bridge, { path, patch }, signal) => bridge.applyPatch(path, patch, signal),
});

export function createBridgeToolRegistry(): BridgeToolRegistry {
  return new BridgeToolRegistry()
    .register(runCommandTool)
    .register(readFileTool)
    .register(applyPatchTool);
}
