/**
 * Applies optimization actions to a tunable parameter store
 */

import type { OptimizationAction, OptimizerConfig } from '../../src/types/common.js';
import { consoleLogger, type StructuredLogger } from '../../src/utils/logger.js';
import { ACTION_TARGETS } from '../actions.js';
import { ActionExecutionError } from '../errors.js';
import { NEUTRAL_SCORE } from '../metrics/snapshot.js';
import type { ParameterStore } from './parameter_store.js';

export type ExecutorConfig = OptimizerConfig['executor'];

export interface ActionExecutor {
  /** Resolves to false on failure; never rejects */
  execute(action: OptimizationAction): Promise<boolean>;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Nudges the metric an action targets by its `adjustment` parameter,
 * capped at `max_adjustment_rate` per execution and kept within [0, 1].
 * Without a store every action fails.
 */
export class ParameterStoreExecutor implements ActionExecutor {
  private readonly maxAdjustmentRate: number;

  constructor(
    private readonly store: ParameterStore | undefined,
    config: Partial<ExecutorConfig> = {},
    private readonly logger: StructuredLogger = consoleLogger
  ) {
    this.maxAdjustmentRate = config.max_adjustment_rate ?? 0.1;
  }

  async execute(action: OptimizationAction): Promise<boolean> {
    let success = false;

    try {
      success = this.applyAction(action);
    } catch (error) {
      const failure = new ActionExecutionError(action.kind, error);
      this.logger.error('execute optimization action', failure, { action_kind: action.kind });
    }

    const record = {
      action_kind: action.kind,
      parameters: action.parameters,
      success
    };
    if (success) {
      this.logger.debug(`Executed ${action.kind}`, record);
    } else {
      this.logger.warn(`Optimization action ${action.kind} did not apply`, record);
    }

    return success;
  }

  private applyAction(action: OptimizationAction): boolean {
    if (!this.store) {
      return false;
    }

    const metric = ACTION_TARGETS[action.kind];
    const requested = action.parameters.adjustment ?? 0;
    if (!Number.isFinite(requested)) {
      throw new Error(`adjustment must be a finite number, got ${requested}`);
    }

    const current = this.store.get(metric) ?? action.parameters.current ?? NEUTRAL_SCORE;
    const step = clamp(requested, -this.maxAdjustmentRate, this.maxAdjustmentRate);

    this.store.set(metric, clamp(current + step, 0, 1));
    return true;
  }
}
