/**
 * Metrics Optimization Loop
 *
 * Main integration point that combines:
 * - Metrics collection from pluggable sources
 * - Threshold-based optimization policy
 * - Action execution against a parameter store
 * - The periodic loop and its analytics
 */

export { MetricsSnapshot, METRIC_WEIGHTS, NEUTRAL_SCORE, computeComposite, normalizeScores } from './metrics/snapshot.js';
export {
  SourcedMetricsCollector,
  RandomMetricSource,
  ParameterStoreSource,
  DEFAULT_RANDOM_RANGES,
  type MetricsCollector,
  type MetricSource,
  type PartialScores,
  type ScoreRange
} from './metrics/metrics_collector.js';
export { isDecliningTrend, isImprovingTrend } from './metrics/trends.js';
export { AdaptiveThresholdPolicy, type OptimizationPolicy, type PolicyConfig } from './policy/optimization_policy.js';
export { ParameterStoreExecutor, type ActionExecutor, type ExecutorConfig } from './executor/action_executor.js';
export { InMemoryParameterStore, type ParameterStore } from './executor/parameter_store.js';
export { OptimizationLoop, type LoopCallback, type LoopConfig, type LoopOptions } from './loop/optimization_loop.js';
export {
  OptimizationAnalytics,
  NO_DATA_REPORT,
  type AnalyticsConfig,
  type AnalyticsSource
} from './analytics/optimization_analytics.js';
export { ACTION_CATALOGUE, ACTION_TARGETS, PRIORITY_RANK, compareActions } from './actions.js';
export * from './errors.js';
export type {
  ActionKind,
  AnalyticsReport,
  LoopState,
  LoopStatus,
  MetricName,
  MetricScores,
  NoDataReport,
  OptimizationAction,
  OptimizationPriority,
  OptimizationStats,
  OptimizationStrategy,
  OptimizerConfig
} from '../src/types/common.js';
export { METRIC_NAMES, OPTIMIZATION_STRATEGIES } from '../src/types/common.js';

import type { OptimizationStrategy, OptimizerConfig } from '../src/types/common.js';
import { consoleLogger, type StructuredLogger } from '../src/utils/logger.js';
import type { ActionExecutor } from './executor/action_executor.js';
import { ParameterStoreExecutor } from './executor/action_executor.js';
import { InMemoryParameterStore } from './executor/parameter_store.js';
import { OptimizationLoop, type LoopCallback, type LoopOptions } from './loop/optimization_loop.js';
import type { MetricsCollector, MetricSource } from './metrics/metrics_collector.js';
import { ParameterStoreSource, RandomMetricSource, SourcedMetricsCollector } from './metrics/metrics_collector.js';
import type { OptimizationPolicy } from './policy/optimization_policy.js';
import { AdaptiveThresholdPolicy } from './policy/optimization_policy.js';

/**
 * Wire a loop from its three collaborators
 */
export function createLoop(
  collector: MetricsCollector,
  policy: OptimizationPolicy,
  executor: ActionExecutor,
  options: LoopOptions = {}
): OptimizationLoop {
  return new OptimizationLoop(collector, policy, executor, options);
}

/**
 * Register an optional monitoring callback, then start the loop
 */
export function startWithMonitoring(
  loop: OptimizationLoop,
  strategy: OptimizationStrategy = 'adaptive',
  monitoringCallback?: LoopCallback
): OptimizationLoop {
  if (monitoringCallback) {
    loop.registerCallback(monitoringCallback);
  }

  loop.start(strategy);

  return loop;
}

export interface ConfiguredLoop {
  loop: OptimizationLoop;
  store: InMemoryParameterStore;
}

/**
 * Build a loop from configuration: random placeholder readings blended
 * with the parameter store the executor tunes. The store starts empty and
 * is read last, so once an action has adjusted a metric the store's value
 * replaces the random reading for it.
 */
export function createLoopFromConfig(
  config: OptimizerConfig,
  logger: StructuredLogger = consoleLogger,
  extraSources: MetricSource[] = []
): ConfiguredLoop {
  const store = new InMemoryParameterStore();
  const collector = new SourcedMetricsCollector(
    [new RandomMetricSource(), ...extraSources, new ParameterStoreSource(store)],
    logger
  );
  const policy = new AdaptiveThresholdPolicy(config.policy);
  const executor = new ParameterStoreExecutor(store, config.executor, logger);

  const loop = createLoop(collector, policy, executor, {
    interval_ms: config.loop.interval_ms,
    history_capacity: config.loop.history_capacity,
    action_history_capacity: config.loop.action_history_capacity,
    stop_timeout_ms: config.loop.stop_timeout_ms,
    analytics: config.analytics,
    logger
  });

  return { loop, store };
}
