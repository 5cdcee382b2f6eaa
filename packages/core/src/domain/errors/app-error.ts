/**
 * @file packages/core/src/domain/errors/app-error.ts
 * @description Error taxonomy for the coordination fabric.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Malformed or empty data from a collaborator (tool process, planning capability). */
export class ProtocolError extends AppError {
  constructor(message: string, code = 'PROTOCOL_ERROR') {
    super(message, code);
    this.name = 'ProtocolError';
  }
}

export class PlanExtractionError extends ProtocolError {
  constructor(message = 'No JSON payload found in orchestrator response') {
    super(message, 'PLAN_EXTRACTION_ERROR');
    this.name = 'PlanExtractionError';
  }
}

export class PlanValidationError extends ProtocolError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'PLAN_VALIDATION_ERROR');
    this.name = 'PlanValidationError';
  }
}

export class ActionValidationError extends ProtocolError {
  constructor(message: string) {
    super(message, 'ACTION_VALIDATION_ERROR');
    this.name = 'ActionValidationError';
  }
}

export class UnknownToolError extends AppError {
  constructor(public readonly tool: string) {
    super(`Unknown tool requested by specialist: ${tool}`, 'UNKNOWN_TOOL');
    this.name = 'UnknownToolError';
  }
}

export class UnknownChannelError extends AppError {
  constructor(public readonly channel: string) {
    super(`Unknown bus channel: ${channel}`, 'UNKNOWN_CHANNEL');
    this.name = 'UnknownChannelError';
  }
}

/** Tool process could not be started, attached, or used. */
export class BridgeError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BRIDGE_ERROR');
    this.name = 'BridgeError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Programmer error: an agent or plan used before it exists. */
export class LifecycleError extends AppError {
  constructor(message: string) {
    super(message, 'LIFECYCLE_ERROR', false);
    this.name = 'LifecycleError';
  }
}

export class UnroutedStepError extends AppError {
  constructor(
    public readonly step: string,
    public readonly role: string,
  ) {
    super(`Workflow step "${step}" targets unknown role "${role}"`, 'UNROUTED_STEP');
    this.name = 'UnroutedStepError';
  }
}

export class PlanningError extends AppError {
  constructor(message: string) {
    super(message, 'PLANNING_ERROR');
    this.name = 'PlanningError';
  }
}

/**
 * Error code used on alerts; errors outside the taxonomy map to UNEXPECTED.
 */
export function errorCode(error: unknown): string {
  return error instanceof AppError ? error.code : 'UNEXPECTED';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
