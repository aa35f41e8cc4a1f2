import { describe, it, expect, beforeEach } from 'vitest'
import { AdaptiveThresholdPolicy } from './optimization_policy.js'
import { MetricsSnapshot } from '../metrics/snapshot.js'

const fixedClock = () => new Date('2024-01-01T00:00:00.000Z')

function historyOf(composites: number[]): MetricsSnapshot[] {
  // A uniform reading gives a composite equal to that reading
  return composites.map(value => new MetricsSnapshot({
    coherence: value,
    stability: value,
    resonance: value,
    efficiency: value,
    harmony: value
  }))
}

describe('AdaptiveThresholdPolicy', () => {
  let policy: AdaptiveThresholdPolicy

  beforeEach(() => {
    policy = new AdaptiveThresholdPolicy({}, fixedClock)
  })

  describe('evaluate', () => {
    it('should not optimize a healthy snapshot without history', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores())
      expect(policy.evaluate(snapshot, [])).toBe(false)
    })

    it('should optimize when the composite is below the global threshold', () => {
      const policyWithoutFloors = new AdaptiveThresholdPolicy({
        critical_thresholds: { coherence: 0, stability: 0, resonance: 0, efficiency: 0, harmony: 0 }
      })
      const snapshot = new MetricsSnapshot(historyOf([0.55])[0].scores)

      expect(policyWithoutFloors.evaluate(snapshot, [])).toBe(true)
    })

    it('should optimize on a single metric breach even with a passing composite', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores({ coherence: 0.3 }))

      expect(snapshot.composite).toBeGreaterThanOrEqual(0.6)
      expect(policy.evaluate(snapshot, [])).toBe(true)
    })

    it.each([
      ['coherence', 0.49],
      ['stability', 0.59],
      ['resonance', 0.39],
      ['efficiency', 0.69],
      ['harmony', 0.49]
    ] as const)('should flag %s below its critical threshold', (metric, value) => {
      const scores = testUtils.createScores()
      scores[metric] = value
      const snapshot = new MetricsSnapshot(scores)
      expect(policy.evaluate(snapshot, [])).toBe(true)
    })

    it('should not flag metrics sitting exactly on their thresholds', () => {
      const snapshot = new MetricsSnapshot({
        coherence: 0.5,
        stability: 0.6,
        resonance: 0.4,
        efficiency: 0.7,
        harmony: 0.5
      })
      const lenient = new AdaptiveThresholdPolicy({ global_threshold: 0 })

      expect(lenient.evaluate(snapshot, [])).toBe(false)
    })

    it('should optimize a healthy snapshot when recent history declines', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores())
      const history = historyOf([0.9, 0.9, 0.8, 0.8, 0.8])

      expect(policy.evaluate(snapshot, history)).toBe(true)
    })

    it('should skip the trend check with fewer than five history entries', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores())
      const history = historyOf([0.95, 0.8, 0.7, 0.7])

      expect(policy.evaluate(snapshot, history)).toBe(false)
    })

    it('should only look at the latest five history entries', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores())
      // The old 0.99 values drop out of the window; the last five are flat
      const history = historyOf([0.99, 0.99, 0.8, 0.8, 0.8, 0.8, 0.8])

      expect(policy.evaluate(snapshot, history)).toBe(false)
    })
  })

  describe('proposeActions', () => {
    it('should propose a single boost for a coherence breach', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores({ coherence: 0.3 }))

      const actions = policy.proposeActions(snapshot)

      expect(actions).toHaveLength(1)
      expect(actions[0]).toMatchObject({
        kind: 'boost_coherence',
        priority: 'coherence',
        expected_impact: 0.3,
        confidence: 0.8,
        created_at: '2024-01-01T00:00:00.000Z'
      })
      expect(actions[0].parameters.adjustment).toBeCloseTo(0.2, 10)
      expect(actions[0].parameters.current).toBe(0.3)
      expect(actions[0].parameters.target).toBe(0.5)
    })

    it('should propose nothing for a healthy snapshot', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores())
      expect(policy.proposeActions(snapshot)).toEqual([])
    })

    it('should order every breach by priority', () => {
      const snapshot = new MetricsSnapshot({
        coherence: 0.1,
        stability: 0.1,
        resonance: 0.1,
        efficiency: 0.1,
        harmony: 0.1
      })

      const actions = policy.proposeActions(snapshot)

      expect(actions.map(a => a.kind)).toEqual([
        'boost_coherence',
        'enhance_stability',
        'amplify_resonance',
        'enhance_harmony',
        'optimize_efficiency'
      ])
      expect(actions.map(a => a.confidence)).toEqual([0.8, 0.7, 0.6, 0.7, 0.9])
    })

    it('should place the coherence boost before the harmony action', () => {
      const snapshot = new MetricsSnapshot(testUtils.createScores({ coherence: 0.2, harmony: 0.1 }))

      const kinds = policy.proposeActions(snapshot).map(a => a.kind)

      expect(kinds.filter(kind => kind === 'boost_coherence')).toHaveLength(1)
      expect(kinds.indexOf('boost_coherence')).toBeLessThan(kinds.indexOf('enhance_harmony'))
    })

    it('should carry the gap to the configured threshold', () => {
      const custom = new AdaptiveThresholdPolicy({
        critical_thresholds: { coherence: 0.5, stability: 0.6, resonance: 0.4, efficiency: 0.9, harmony: 0.5 }
      })
      const snapshot = new MetricsSnapshot(testUtils.createScores())

      const [action] = custom.proposeActions(snapshot)

      expect(action.kind).toBe('optimize_efficiency')
      expect(action.parameters.adjustment).toBeCloseTo(0.1, 10)
    })
  })
})
