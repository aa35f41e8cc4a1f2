/**
 * Metrics collection from pluggable sources
 */

import { METRIC_NAMES, type MetricName } from '../../src/types/common.js';
import { consoleLogger, type StructuredLogger } from '../../src/utils/logger.js';
import { CollectionDegradedError } from '../errors.js';
import type { ParameterStore } from '../executor/parameter_store.js';
import { MetricsSnapshot } from './snapshot.js';

export type PartialScores = Partial<Record<MetricName, number>>;

export interface MetricSource {
  readonly name: string;
  read(): PartialScores | Promise<PartialScores>;
}

export interface MetricsCollector {
  /** Never rejects; unavailable metrics come back as the neutral score */
  collect(): Promise<MetricsSnapshot>;
}

/**
 * Merges readings from each source in order. A later source overrides an
 * earlier one for the same metric. A source that throws is skipped with a
 * warning.
 */
export class SourcedMetricsCollector implements MetricsCollector {
  constructor(
    private readonly sources: MetricSource[],
    private readonly logger: StructuredLogger = consoleLogger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async collect(): Promise<MetricsSnapshot> {
    const merged: PartialScores = {};

    for (const source of this.sources) {
      try {
        const reading = await source.read();
        for (const metric of METRIC_NAMES) {
          const value = reading[metric];
          if (value !== undefined) {
            merged[metric] = value;
          }
        }
      } catch (error) {
        const degraded = new CollectionDegradedError(source.name, error);
        this.logger.warn(degraded.message, { source: source.name, code: degraded.code });
      }
    }

    const neutral = METRIC_NAMES.filter(metric => {
      const value = merged[metric];
      return value === undefined || !Number.isFinite(value);
    });
    if (neutral.length > 0) {
      this.logger.debug('Substituting neutral score for unavailable metrics', { metrics: neutral });
    }

    return new MetricsSnapshot(merged, this.clock());
  }
}

export type ScoreRange = readonly [min: number, max: number];

export const DEFAULT_RANDOM_RANGES: Readonly<Record<MetricName, ScoreRange>> = {
  coherence: [0.4, 0.95],
  stability: [0.5, 0.95],
  resonance: [0.3, 0.9],
  efficiency: [0.6, 0.9],
  harmony: [0.5, 0.8]
};

/**
 * Placeholder source drawing each metric uniformly from its range
 */
export class RandomMetricSource implements MetricSource {
  readonly name = 'random';

  constructor(
    private readonly ranges: Partial<Record<MetricName, ScoreRange>> = DEFAULT_RANDOM_RANGES,
    private readonly random: () => number = Math.random
  ) {}

  read(): PartialScores {
    const reading: PartialScores = {};
    for (const metric of METRIC_NAMES) {
      const range = this.ranges[metric];
      if (!range) continue;
      const [min, max] = range;
      reading[metric] = min + (max - min) * this.random();
    }
    return reading;
  }
}

/**
 * Reads current metric values back out of a parameter store, so that
 * executed actions show up in the next collection
 */
export class ParameterStoreSource implements MetricSource {
  readonly name = 'parameter_store';

  constructor(
    private readonly store: ParameterStore,
    private readonly metrics: readonly MetricName[] = METRIC_NAMES
  ) {}

  read(): PartialScores {
    const reading: PartialScores = {};
    for (const metric of this.metrics) {
      const value = this.store.get(metric);
      if (value !== undefined) {
        reading[metric] = value;
      }
    }
    return reading;
  }
}
