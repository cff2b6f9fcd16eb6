import type { ProductionStage } from './stages.js';

export class ProductionError extends Error {
  readonly stage?: ProductionStage;

  constructor(message: string, stage?: ProductionStage) {
    super(message);
    this.name = 'ProductionError';
    this.stage = stage;
  }
}

/** The pipeline reached a state its stage order does not allow. */
export class InvariantViolationError extends ProductionError {
  constructor(message: string, stage?: ProductionStage) {
    super(message, stage);
    this.name = 'InvariantViolationError';
  }
}

/** A progress record could not be created, so the run never started. */
export class PersistenceError extends ProductionError {
  constructor(message: string) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class RunInProgressError extends ProductionError {
  constructor(entityId: string) {
    super(`A production run is already active for entity ${entityId}`);
    this.name = 'RunInProgressError';
  }
}

/**
 * Thrown by a stage executor when one item's fault means the whole stage
 * cannot continue (quota exhausted, upstream misconfigured).
 */
export class StageAbortError extends ProductionError {
  constructor(message: string, stage?: ProductionStage) {
    super(message, stage);
    this.name = 'StageAbortError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
