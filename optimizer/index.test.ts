import { describe, it, expect, vi, afterEach } from 'vitest'
import { mock } from 'vitest-mock-extended'
import {
  createLoop,
  createLoopFromConfig,
  startWithMonitoring,
  AdaptiveThresholdPolicy,
  MetricsSnapshot,
  OptimizationLoop,
  type ActionExecutor,
  type MetricsCollector
} from './index.js'
import { getDefaultConfig } from '../src/config.js'
import type { StructuredLogger } from '../src/utils/logger.js'

describe('Optimizer entry points', () => {
  let loop: OptimizationLoop | undefined

  afterEach(async () => {
    await loop?.stop()
    loop = undefined
  })

  it('should wire a loop from its collaborators', async () => {
    const collector: MetricsCollector = {
      collect: async () => new MetricsSnapshot(testUtils.createScores({ stability: 0.2 }))
    }
    const executor: ActionExecutor = { execute: vi.fn().mockResolvedValue(true) }

    loop = createLoop(collector, new AdaptiveThresholdPolicy(), executor, { logger: mock<StructuredLogger>() })
    await loop.runCycle()

    expect(loop).toBeInstanceOf(OptimizationLoop)
    expect(executor.execute).toHaveBeenCalledWith(expect.objectContaining({ kind: 'enhance_stability' }))
  })

  it('should register the monitoring callback and start the loop', async () => {
    const collector: MetricsCollector = {
      collect: async () => new MetricsSnapshot(testUtils.createScores())
    }
    const executor: ActionExecutor = { execute: vi.fn().mockResolvedValue(true) }
    const logger = mock<StructuredLogger>()
    const created = createLoop(collector, new AdaptiveThresholdPolicy(), executor, { logger, interval_ms: 1000 })
    loop = created

    const firstSnapshot = new Promise<MetricsSnapshot>(resolve => {
      expect(startWithMonitoring(created, 'adaptive', resolve)).toBe(created)
    })

    const snapshot = await testUtils.withTimeout(firstSnapshot, 2000)

    expect(snapshot.composite).toBeCloseTo(0.8, 10)
    expect(created.getStatus().is_running).toBe(true)
    expect(logger.info).toHaveBeenCalledWith('Optimization loop started', { strategy: 'adaptive', interval_ms: 1000 })
  })

  it('should build a loop whose executor tunes the shared store', async () => {
    const config = getDefaultConfig()
    const { loop: configured, store } = createLoopFromConfig(config, mock<StructuredLogger>(), [
      { name: 'fixture', read: () => ({ coherence: 0.3 }) }
    ])
    loop = configured

    await loop.runCycle()

    // 0.3 nudged towards 0.5, capped at the 0.1 max adjustment rate
    expect(store.get('coherence')).toBeCloseTo(0.4, 10)
    expect(loop.getStatus().successful_optimizations).toBeGreaterThanOrEqual(1)
    expect(loop.getActionHistory()[0].kind).toBe('boost_coherence')
  })

  it('should read adjusted values back from the store on the next cycle', async () => {
    const { loop: configured } = createLoopFromConfig(getDefaultConfig(), mock<StructuredLogger>(), [
      { name: 'fixture', read: () => ({ coherence: 0.3 }) }
    ])
    loop = configured

    await loop.runCycle()
    const second = await loop.runCycle()

    expect(second.scores.coherence).toBeCloseTo(0.4, 10)
  })
})
