import type { PredictionState, RejectionCode } from './prediction.types';

export abstract class PredictionError extends Error {
  abstract readonly code: RejectionCode;
  /** Set by the engine to the state the run was in when this was thrown. */
  stage?: Exclude<PredictionState, 'Rejected'>;
}

/**
 * The request is malformed enough that no meaningful prediction can be
 * produced. Terminal for that item only.
 */
export class StructuralError extends PredictionError {
  constructor(
    readonly code: Exclude<RejectionCode, 'computation_error'>,
    message: string,
  ) {
    super(message);
    this.name = 'StructuralError';
  }
}

export class ComputationError extends PredictionError {
  readonly code = 'computation_error' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ComputationError';
  }
}
