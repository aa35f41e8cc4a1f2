/**
 * Read-only analytics over the loop's bounded history
 */

import {
  METRIC_NAMES,
  type ActionKind,
  type AnalyticsReport,
  type MetricScores,
  type NoDataReport,
  type OptimizationAction,
  type OptimizationStats,
  type OptimizerConfig
} from '../../src/types/common.js';
import type { MetricsSnapshot } from '../metrics/snapshot.js';
import { isImprovingTrend } from '../metrics/trends.js';

export type AnalyticsConfig = OptimizerConfig['analytics'];

/**
 * What the analytics read from. The loop implements this over its own
 * buffers; nothing is copied into separate storage.
 */
export interface AnalyticsSource {
  getHistory(): readonly MetricsSnapshot[];
  getActionHistory(): readonly OptimizationAction[];
  getStats(): OptimizationStats;
}

export const NO_DATA_REPORT: Readonly<NoDataReport> = Object.freeze({
  status: 'no_data',
  message: 'No optimization data available'
});

export class OptimizationAnalytics {
  private readonly config: AnalyticsConfig;

  constructor(
    private readonly source: AnalyticsSource,
    config: Partial<AnalyticsConfig> = {}
  ) {
    this.config = {
      recent_window: config.recent_window ?? 10,
      improvement_ratio: config.improvement_ratio ?? 1.02
    };
  }

  report(): AnalyticsReport | NoDataReport {
    const history = this.source.getHistory();
    if (history.length === 0) {
      return { ...NO_DATA_REPORT };
    }

    const stats = this.source.getStats();
    const recentPerformance = history.slice(-this.config.recent_window).map(s => s.composite);

    return {
      status: 'ok',
      optimization_period_seconds: this.periodSeconds(history),
      overall_trend: isImprovingTrend(recentPerformance, this.config.improvement_ratio) ? 'improving' : 'declining',
      average_metrics: this.averageMetrics(history),
      optimization_effectiveness: stats.successful_optimizations / Math.max(1, stats.total_optimizations),
      recent_performance: recentPerformance,
      action_distribution: this.actionDistribution(this.source.getActionHistory())
    };
  }

  private periodSeconds(history: readonly MetricsSnapshot[]): number {
    const first = new Date(history[0].taken_at).getTime();
    const last = new Date(history[history.length - 1].taken_at).getTime();
    return (last - first) / 1000;
  }

  private averageMetrics(history: readonly MetricsSnapshot[]): MetricScores {
    const totals: MetricScores = { coherence: 0, stability: 0, resonance: 0, efficiency: 0, harmony: 0 };

    for (const snapshot of history) {
      for (const metric of METRIC_NAMES) {
        totals[metric] += snapshot.scores[metric];
      }
    }

    for (const metric of METRIC_NAMES) {
      totals[metric] /= history.length;
    }

    return totals;
  }

  private actionDistribution(actions: readonly OptimizationAction[]): Partial<Record<ActionKind, number>> {
    const distribution: Partial<Record<ActionKind, number>> = {};

    for (const action of actions) {
      distribution[action.kind] = (distribution[action.kind] ?? 0) + 1;
    }

    return distribution;
  }
}
