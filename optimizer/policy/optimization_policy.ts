/**
 * Threshold-based optimization policy
 *
 * Decides when a snapshot needs optimizing and which corrective actions to
 * propose for it.
 */

import { METRIC_NAMES, type MetricName, type OptimizationAction, type OptimizerConfig } from '../../src/types/common.js';
import { getDefaultConfig } from '../../src/config.js';
import { ACTION_CATALOGUE, compareActions } from '../actions.js';
import type { MetricsSnapshot } from '../metrics/snapshot.js';
import { isDecliningTrend } from '../metrics/trends.js';

export type PolicyConfig = OptimizerConfig['policy'];

export interface OptimizationPolicy {
  /**
   * @param history - snapshots recorded before `snapshot`, oldest first
   */
  evaluate(snapshot: MetricsSnapshot, history: readonly MetricsSnapshot[]): boolean;
  proposeActions(snapshot: MetricsSnapshot): OptimizationAction[];
}

export class AdaptiveThresholdPolicy implements OptimizationPolicy {
  private readonly config: PolicyConfig;

  constructor(
    config: Partial<PolicyConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    const defaults = getDefaultConfig().policy;
    this.config = {
      ...defaults,
      ...config,
      critical_thresholds: {
        ...defaults.critical_thresholds,
        ...config.critical_thresholds
      }
    };
  }

  /**
   * Metrics below their critical threshold, in metric order
   */
  breachedMetrics(snapshot: MetricsSnapshot): MetricName[] {
    return METRIC_NAMES.filter(metric => snapshot.scores[metric] < this.config.critical_thresholds[metric]);
  }

  evaluate(snapshot: MetricsSnapshot, history: readonly MetricsSnapshot[]): boolean {
    if (snapshot.composite < this.config.global_threshold) {
      return true;
    }

    if (this.breachedMetrics(snapshot).length > 0) {
      return true;
    }

    // Trend check needs a full window of history
    if (history.length >= this.config.trend_window) {
      const recent = history.slice(-this.config.trend_window).map(s => s.composite);
      if (isDecliningTrend(recent, this.config.decline_ratio)) {
        return true;
      }
    }

    return false;
  }

  proposeActions(snapshot: MetricsSnapshot): OptimizationAction[] {
    const createdAt = this.clock().toISOString();

    const actions = this.breachedMetrics(snapshot).map((metric): OptimizationAction => {
      const template = ACTION_CATALOGUE[metric];
      const current = snapshot.scores[metric];
      const target = this.config.critical_thresholds[metric];

      return {
        kind: template.kind,
        parameters: {
          adjustment: target - current,
          current,
          target
        },
        priority: metric,
        expected_impact: template.expected_impact,
        confidence: template.confidence,
        created_at: createdAt
      };
    });

    return actions.sort(compareActions);
  }
}
