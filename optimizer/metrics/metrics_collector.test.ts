import { describe, it, expect, vi } from 'vitest'
import { mock } from 'vitest-mock-extended'
import {
  SourcedMetricsCollector,
  RandomMetricSource,
  ParameterStoreSource,
  type MetricSource
} from './metrics_collector.js'
import { NEUTRAL_SCORE } from './snapshot.js'
import { InMemoryParameterStore } from '../executor/parameter_store.js'
import type { StructuredLogger } from '../../src/utils/logger.js'

const fixedClock = () => new Date('2024-01-01T00:00:00.000Z')

function source(name: string, read: MetricSource['read']): MetricSource {
  return { name, read }
}

describe('SourcedMetricsCollector', () => {
  it('should merge readings from every source', async () => {
    const collector = new SourcedMetricsCollector([
      source('a', () => ({ coherence: 0.9, stability: 0.8 })),
      source('b', async () => ({ resonance: 0.7, efficiency: 0.6, harmony: 0.5 }))
    ], mock<StructuredLogger>(), fixedClock)

    const snapshot = await collector.collect()

    expect(snapshot.scores).toEqual({
      coherence: 0.9,
      stability: 0.8,
      resonance: 0.7,
      efficiency: 0.6,
      harmony: 0.5
    })
    expect(snapshot.taken_at).toBe('2024-01-01T00:00:00.000Z')
  })

  it('should let later sources override earlier ones', async () => {
    const collector = new SourcedMetricsCollector([
      source('first', () => ({ coherence: 0.2 })),
      source('second', () => ({ coherence: 0.7 }))
    ], mock<StructuredLogger>())

    const snapshot = await collector.collect()

    expect(snapshot.scores.coherence).toBe(0.7)
  })

  it('should substitute the neutral score when a source throws', async () => {
    const logger = mock<StructuredLogger>()
    const collector = new SourcedMetricsCollector([
      source('healthy', () => ({ coherence: 0.9 })),
      source('broken', () => {
        throw new Error('sensor offline')
      })
    ], logger)

    const snapshot = await collector.collect()

    expect(snapshot.scores.coherence).toBe(0.9)
    expect(snapshot.scores.harmony).toBe(NEUTRAL_SCORE)
    expect(logger.warn).toHaveBeenCalledWith(
      'Metric source "broken" unavailable: sensor offline',
      { source: 'broken', code: 'collection_degraded' }
    )
  })

  it('should survive a rejecting async source', async () => {
    const logger = mock<StructuredLogger>()
    const collector = new SourcedMetricsCollector([
      source('remote', () => Promise.reject(new Error('timeout')))
    ], logger)

    const snapshot = await collector.collect()

    expect(snapshot.composite).toBeCloseTo(NEUTRAL_SCORE, 10)
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('should produce a neutral snapshot with no sources at all', async () => {
    const logger = mock<StructuredLogger>()
    const collector = new SourcedMetricsCollector([], logger)

    const snapshot = await collector.collect()

    expect(snapshot.composite).toBeCloseTo(NEUTRAL_SCORE, 10)
    expect(logger.debug).toHaveBeenCalledWith(
      'Substituting neutral score for unavailable metrics',
      { metrics: ['coherence', 'stability', 'resonance', 'efficiency', 'harmony'] }
    )
  })
})

describe('RandomMetricSource', () => {
  it('should draw each metric from its range', () => {
    const random = vi.fn().mockReturnValue(0.5)
    const randomSource = new RandomMetricSource({ efficiency: [0.6, 0.9], harmony: [0.5, 0.8] }, random)

    const reading = randomSource.read()

    expect(reading.efficiency).toBeCloseTo(0.75, 10)
    expect(reading.harmony).toBeCloseTo(0.65, 10)
    expect(reading.coherence).toBeUndefined()
    expect(random).toHaveBeenCalledTimes(2)
  })

  it('should stay inside the default ranges', () => {
    const randomSource = new RandomMetricSource(undefined, () => 0.999)
    const reading = randomSource.read()

    expect(reading.coherence).toBeLessThan(0.95)
    expect(reading.resonance).toBeGreaterThan(0.3)
  })
})

describe('ParameterStoreSource', () => {
  it('should read only the metrics the store holds', () => {
    const store = new InMemoryParameterStore({ coherence: 0.42 })
    const storeSource = new ParameterStoreSource(store)

    expect(storeSource.read()).toEqual({ coherence: 0.42 })
  })

  it('should restrict reads to the configured metrics', () => {
    const store = new InMemoryParameterStore({ coherence: 0.42, harmony: 0.3 })
    const storeSource = new ParameterStoreSource(store, ['harmony'])

    expect(storeSource.read()).toEqual({ harmony: 0.3 })
  })
})
