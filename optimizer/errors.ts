/**
 * Error taxonomy for the optimization loop. None of these are fatal: each
 * is logged where it happens and the loop keeps running.
 */

export type OptimizerErrorCode =
  | 'collection_degraded'
  | 'action_execution_failed'
  | 'loop_tick_failed'
  | 'callback_failed';

export class OptimizerError extends Error {
  constructor(
    message: string,
    public readonly code: OptimizerErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'OptimizerError';
  }
}

/**
 * A metric source was unavailable; its metrics fell back to the neutral score
 */
export class CollectionDegradedError extends OptimizerError {
  constructor(public readonly source: string, cause?: unknown) {
    super(`Metric source "${source}" unavailable: ${describeError(cause)}`, 'collection_degraded', cause);
    this.name = 'CollectionDegradedError';
  }
}

export class ActionExecutionError extends OptimizerError {
  constructor(public readonly kind: string, cause?: unknown) {
    super(`Optimization action "${kind}" failed: ${describeError(cause)}`, 'action_execution_failed', cause);
    this.name = 'ActionExecutionError';
  }
}

export class LoopTickError extends OptimizerError {
  constructor(public readonly tick: number, cause?: unknown) {
    super(`Optimization tick ${tick} failed: ${describeError(cause)}`, 'loop_tick_failed', cause);
    this.name = 'LoopTickError';
  }
}

export class CallbackError extends OptimizerError {
  constructor(public readonly callbackName: string, cause?: unknown) {
    super(`Optimization callback "${callbackName}" threw: ${describeError(cause)}`, 'callback_failed', cause);
    this.name = 'CallbackError';
  }
}

/**
 * One-line description of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error === undefined) return 'unknown error';
  return String(error);
}
