/**
 * Catalogue of corrective actions, one per tracked metric
 */

import type { ActionKind, MetricName, OptimizationAction, OptimizationPriority } from '../src/types/common.js';

export interface ActionTemplate {
  kind: ActionKind;
  expected_impact: number;
  confidence: number;
}

export const ACTION_CATALOGUE: Readonly<Record<MetricName, ActionTemplate>> = {
  coherence: { kind: 'boost_coherence', expected_impact: 0.3, confidence: 0.8 },
  stability: { kind: 'enhance_stability', expected_impact: 0.25, confidence: 0.7 },
  resonance: { kind: 'amplify_resonance', expected_impact: 0.2, confidence: 0.6 },
  efficiency: { kind: 'optimize_efficiency', expected_impact: 0.15, confidence: 0.9 },
  harmony: { kind: 'enhance_harmony', expected_impact: 0.2, confidence: 0.7 }
};

/** Metric each action kind adjusts */
export const ACTION_TARGETS: Readonly<Record<ActionKind, MetricName>> = {
  boost_coherence: 'coherence',
  enhance_stability: 'stability',
  amplify_resonance: 'resonance',
  optimize_efficiency: 'efficiency',
  enhance_harmony: 'harmony'
};

/** Lower rank runs first */
export const PRIORITY_RANK: Readonly<Record<OptimizationPriority, number>> = {
  coherence: 0,
  stability: 1,
  resonance: 2,
  harmony: 3,
  efficiency: 4
};

/**
 * Sort comparator: priority rank ascending, then expected impact descending
 */
export function compareActions(a: OptimizationAction, b: OptimizationAction): number {
  const priorityDiff = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (priorityDiff !== 0) return priorityDiff;

  return b.expected_impact - a.expected_impact;
}
