/**
 * Immutable record of the five tracked metric scores and their weighted
 * composite.
 */

import { METRIC_NAMES, type MetricName, type MetricScores } from '../../src/types/common.js';

/** Substituted for any metric that is missing or not a finite number */
export const NEUTRAL_SCORE = 0.5;

export const METRIC_WEIGHTS: Readonly<MetricScores> = Object.freeze({
  coherence: 0.25,
  stability: 0.20,
  resonance: 0.20,
  efficiency: 0.15,
  harmony: 0.20
});

/**
 * Fills every metric, using {@link NEUTRAL_SCORE} where the input has no
 * usable value
 */
export function normalizeScores(input: Partial<Record<MetricName, number>>): MetricScores {
  const read = (metric: MetricName): number => {
    const value = input[metric];
    return typeof value === 'number' && Number.isFinite(value) ? value : NEUTRAL_SCORE;
  };

  return {
    coherence: read('coherence'),
    stability: read('stability'),
    resonance: read('resonance'),
    efficiency: read('efficiency'),
    harmony: read('harmony')
  };
}

export function computeComposite(scores: MetricScores): number {
  return METRIC_NAMES.reduce((sum, metric) => sum + METRIC_WEIGHTS[metric] * scores[metric], 0);
}

export class MetricsSnapshot {
  readonly taken_at: string;
  readonly scores: Readonly<MetricScores>;
  /** Always derived from `scores`, never set directly */
  readonly composite: number;

  constructor(scores: Partial<Record<MetricName, number>>, takenAt: Date = new Date()) {
    const normalized = normalizeScores(scores);
    this.scores = Object.freeze(normalized);
    this.composite = computeComposite(normalized);
    this.taken_at = takenAt.toISOString();
    Object.freeze(this);
  }

  toJSON(): { taken_at: string; scores: MetricScores; composite: number } {
    return {
      taken_at: this.taken_at,
      scores: { ...this.scores },
      composite: this.composite
    };
  }
}
