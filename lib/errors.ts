import { WorkflowStage, WorkflowStatus } from '@/types';

export class ContentRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContentRequestError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * A stage failure the workflow cannot recover from (no prompt, no content).
 */
export class WorkflowError extends Error {
  constructor(
    readonly stage: WorkflowStage,
    readonly status: WorkflowStatus,
    message: string
  ) {
    super(`Workflow failed at stage "${stage}": ${message}`);
    this.name = 'WorkflowError';
  }
}

export class WorkflowCancelledError extends Error {
  constructor(readonly nextStage: WorkflowStage) {
    super(`Workflow cancelled before stage "${nextStage}"`);
    this.name = 'WorkflowCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
