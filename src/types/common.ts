/**
 * Common types for the metrics optimizer
 */

export const METRIC_NAMES = ['coherence', 'stability', 'resonance', 'efficiency', 'harmony'] as const;

export type MetricName = typeof METRIC_NAMES[number];

export type MetricScores = Record<MetricName, number>;

/**
 * Only `adaptive` has concrete behavior. The other modes are reserved
 * names and run the adaptive thresholds.
 */
export type OptimizationStrategy = 'reactive' | 'predictive' | 'adaptive' | 'proactive';

export const OPTIMIZATION_STRATEGIES: readonly OptimizationStrategy[] = [
  'reactive',
  'predictive',
  'adaptive',
  'proactive'
];

export type ActionKind =
  | 'boost_coherence'
  | 'enhance_stability'
  | 'amplify_resonance'
  | 'optimize_efficiency'
  | 'enhance_harmony';

/**
 * Action priority, highest first: coherence, stability, resonance,
 * harmony, efficiency
 */
export type OptimizationPriority = MetricName;

export interface OptimizationAction {
  kind: ActionKind;
  parameters: Record<string, number>;
  priority: OptimizationPriority;
  /** Advisory only, never gates execution */
  expected_impact: number;
  /** Advisory only, never gates execution */
  confidence: number;
  created_at: string;
}

export type LoopState = 'stopped' | 'running' | 'stopping';

export interface OptimizationStats {
  total_optimizations: number;
  successful_optimizations: number;
  average_improvement: number;
  optimization_frequency: number;
}

export interface LoopStatus extends OptimizationStats {
  is_running: boolean;
  state: LoopState;
  strategy: OptimizationStrategy;
  latest_composite: number | null;
  recent_action_count: number;
  history_length: number;
}

export interface AnalyticsReport {
  status: 'ok';
  optimization_period_seconds: number;
  overall_trend: 'improving' | 'declining';
  average_metrics: MetricScores;
  optimization_effectiveness: number;
  recent_performance: number[];
  action_distribution: Partial<Record<ActionKind, number>>;
}

export interface NoDataReport {
  status: 'no_data';
  message: string;
}

export interface OptimizerConfig {
  loop: {
    interval_ms: number;
    history_capacity: number;
    action_history_capacity: number;
    stop_timeout_ms: number;
    strategy: OptimizationStrategy;
  };
  policy: {
    global_threshold: number;
    critical_thresholds: MetricScores;
    trend_window: number;
    decline_ratio: number;
  };
  executor: {
    max_adjustment_rate: number;
  };
  analytics: {
    recent_window: number;
    improvement_ratio: number;
  };
}
