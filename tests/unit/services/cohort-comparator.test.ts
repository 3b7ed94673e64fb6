import { describe, it, expect } from 'vitest'
import {
  CohortComparator,
  compareValues,
  determineTrend,
} from '../../../src/services/cohort-comparator.js'
import { IssueMetricsAggregator } from '../../../src/services/issue-metrics-aggregator.js'
import { issueMetricDefinitions } from '../../../src/services/metric-definitions.js'
import type { MetricDefinition } from '../../../src/models/comparison.js'
import type { CohortMetricsBase } from '../../../src/models/phase-metrics.js'
import type { IssueWorkItem } from '../../../src/models/work-item.js'
import { AppError } from '../../../src/models/error.js'
import { parseInstant } from '../../../src/utils/instant.js'

interface ReviewMetrics extends CohortMetricsBase {
  reviewReentry: number | null
  closureDays: number | null
}

/**
 * 世代比較器單元測試
 */
describe('CohortComparator', () => {
  const createPhase = (
    label: string,
    reviewReentry: number | null,
    closureDays: number | null,
    actor: string | null = null
  ): ReviewMetrics => ({
    label,
    actor,
    queryWindow: null,
    dateRange: null,
    reviewReentry,
    closureDays,
  })

  const definitions: MetricDefinition<ReviewMetrics>[] = [
    {
      key: 'review.reentry',
      label: 'Review 重複進入率',
      unit: 'ratio',
      polarity: 'lower-is-better',
      extract: (m) => m.reviewReentry,
    },
    {
      key: 'closure',
      label: '平均結案時間',
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.closureDays,
    },
  ]

  describe('determineTrend', () => {
    it('應依方向性判斷改善或退步', () => {
      expect(determineTrend(-1, 'lower-is-better')).toBe('improved')
      expect(determineTrend(1, 'lower-is-better')).toBe('regressed')
      expect(determineTrend(1, 'higher-is-better')).toBe('improved')
      expect(determineTrend(-1, 'higher-is-better')).toBe('regressed')
      expect(determineTrend(1, 'neutral')).toBe('changed')
      expect(determineTrend(0, 'higher-is-better')).toBe('unchanged')
    })
  })

  describe('compareValues', () => {
    it('有值變為不存在應標示為不再出現而非數值差異', () => {
      expect(compareValues(1.13, null, 'lower-is-better')).toEqual({
        kind: 'no-longer-occurs',
        previous: 1.13,
      })
    })

    it('不存在變為有值應標示為新出現', () => {
      expect(compareValues(null, 2, 'lower-is-better')).toEqual({ kind: 'newly-occurs', current: 2 })
    })

    it('兩階段皆不存在', () => {
      expect(compareValues(null, null, 'neutral')).toEqual({ kind: 'not-observed' })
    })

    it('應計算絕對與百分比變化', () => {
      expect(compareValues(4, 3, 'lower-is-better')).toEqual({
        kind: 'numeric',
        absoluteChange: -1,
        percentChange: -25,
        trend: 'improved',
      })
    })

    it('基準為 0 時百分比變化為 null', () => {
      expect(compareValues(0, 3, 'neutral')).toEqual({
        kind: 'numeric',
        absoluteChange: 3,
        percentChange: null,
        trend: 'changed',
      })
    })
  })

  describe('compare', () => {
    const comparator = new CohortComparator(definitions)

    it('應依階段順序對齊各指標', () => {
      const comparison = comparator.compare([
        createPhase('Before', 1.13, 4),
        createPhase('After', null, 5),
      ])

      expect(comparison.actor).toBeNull()
      expect(comparison.phases.map((p) => p.label)).toEqual(['Before', 'After'])
      expect(comparison.rows[0]).toEqual({
        key: 'review.reentry',
        label: 'Review 重複進入率',
        unit: 'ratio',
        polarity: 'lower-is-better',
        values: [1.13, null],
        deltas: [{ kind: 'no-longer-occurs', previous: 1.13 }],
      })
      expect(comparison.rows[1]?.deltas).toEqual([
        { kind: 'numeric', absoluteChange: 1, percentChange: 25, trend: 'regressed' },
      ])
    })

    it('應保留呼叫端給定的階段順序', () => {
      const comparison = comparator.compare([
        createPhase('C', null, 3),
        createPhase('A', null, 6),
        createPhase('B', null, 6),
      ])

      expect(comparison.phases.map((p) => p.label)).toEqual(['C', 'A', 'B'])
      expect(comparison.rows[1]?.deltas.map((d) => (d.kind === 'numeric' ? d.trend : d.kind))).toEqual([
        'regressed',
        'unchanged',
      ])
    })

    it('單一階段不產生差異', () => {
      const comparison = comparator.compare([createPhase('Only', 1, 1)])

      expect(comparison.rows[0]?.deltas).toEqual([])
    })

    it('負責人不一致時應拋出錯誤', () => {
      expect(() =>
        comparator.compare([createPhase('Before', 1, 1, 'jdoe'), createPhase('After', 1, 1, null)])
      ).toThrow(AppError)
    })

    it('指定的負責人須與各階段一致', () => {
      const phases = [createPhase('Before', 1, 1, 'jdoe'), createPhase('After', 1, 1, 'jdoe')]

      expect(comparator.compare(phases, { actor: 'jdoe' }).actor).toBe('jdoe')
      expect(() => comparator.compare(phases, { actor: 'asmith' })).toThrow(
        '階段「Before」的負責人為「jdoe」，與比較範圍「asmith」不一致'
      )
    })
  })

  describe('issue 指標比較', () => {
    const at = (raw: string) => parseInstant(raw)
    const createIssue = (id: string, transitions: Array<[string, string]>, resolvedAt: string): IssueWorkItem => ({
      kind: 'issue',
      id,
      type: 'Story',
      currentState: 'Done',
      actor: null,
      aiTools: [],
      createdAt: at(transitions[0]?.[1] ?? resolvedAt),
      resolvedAt: at(resolvedAt),
      transitions: transitions.map(([toState, raw]) => ({ toState, at: at(raw) })),
    })

    it('某階段沒有出現的狀態應得到不再出現', () => {
      const aggregator = new IssueMetricsAggregator({ trackedStates: [] })
      const before = aggregator.aggregate(
        [
          createIssue(
            'A-1',
            [
              ['Review', '2024-01-01'],
              ['In Progress', '2024-01-02'],
              ['Review', '2024-01-03'],
              ['Done', '2024-01-04'],
            ],
            '2024-01-04'
          ),
        ],
        { label: 'Before' }
      )
      const after = aggregator.aggregate(
        [createIssue('A-2', [['In Progress', '2024-02-01'], ['Done', '2024-02-03']], '2024-02-03')],
        { label: 'After' }
      )

      const comparison = new CohortComparator(issueMetricDefinitions([before, after])).compare([
        before,
        after,
      ])
      const reviewRow = comparison.rows.find((r) => r.key === 'state.Review.reentryRate')

      expect(reviewRow?.values).toEqual([2, null])
      expect(reviewRow?.deltas).toEqual([{ kind: 'no-longer-occurs', previous: 2 }])
    })
  })
})
