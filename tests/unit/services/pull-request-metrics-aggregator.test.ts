import { describe, it, expect } from 'vitest'
import { PullRequestMetricsAggregator } from '../../../src/services/pull-request-metrics-aggregator.js'
import type { PullRequestWorkItem, ReviewRecord } from '../../../src/models/work-item.js'
import { parseInstant } from '../../../src/utils/instant.js'

/**
 * PR 指標聚合器單元測試
 */
describe('PullRequestMetricsAggregator', () => {
  const at = (raw: string) => parseInstant(raw)

  const review = (
    reviewer: string,
    state: ReviewRecord['state'],
    submittedAt: string | null = null,
    body = ''
  ): ReviewRecord => ({ reviewer, state, submittedAt: submittedAt ? at(submittedAt) : null, body })

  const createPr = (
    id: string,
    mergedAt: string | null,
    overrides: Partial<PullRequestWorkItem> = {}
  ): PullRequestWorkItem => ({
    kind: 'pull-request',
    id,
    title: `PR ${id}`,
    actor: 'jdoe',
    createdAt: at('2024-01-01T00:00:00Z'),
    resolvedAt: mergedAt ? at(mergedAt) : null,
    commitMessages: ['init'],
    aiTools: [],
    aiCommitCount: 0,
    reviews: [],
    comments: [],
    additions: 0,
    deletions: 0,
    changedFiles: 0,
    ...overrides,
  })

  const aiPr = createPr('1', '2024-01-02T00:00:00Z', {
    aiTools: ['Claude'],
    aiCommitCount: 1,
    commitMessages: ['init', 'Assisted-by: Claude'],
    reviews: [
      review('asmith', 'CHANGES_REQUESTED', '2024-01-01T06:00:00Z', 'Fix'),
      review('asmith', 'APPROVED', '2024-01-01T12:00:00Z', 'LGTM'),
    ],
    comments: [
      { author: 'coderabbitai', body: 'summary' },
      { author: 'jdoe', body: '@coderabbit review' },
    ],
    additions: 100,
    deletions: 20,
    changedFiles: 4,
  })

  const nonAiPr = createPr('2', '2024-01-04T00:00:00Z', {
    reviews: [
      review('bkim', 'CHANGES_REQUESTED', '2024-01-02T00:00:00Z'),
      review('bkim', 'CHANGES_REQUESTED', null, 'again'),
      review('coderabbitai[bot]', 'COMMENTED', '2024-01-01T01:00:00Z', 'auto'),
    ],
  })

  const slowPr = createPr('3', '2024-01-06T00:00:00Z', {
    reviews: [review('bkim', 'CHANGES_REQUESTED'), review('bkim', 'CHANGES_REQUESTED')],
  })

  const aggregator = new PullRequestMetricsAggregator()

  describe('measure', () => {
    it('應計算單一 PR 的審查與規模指標', () => {
      expect(aggregator.measure(aiPr)).toEqual({
        id: '1',
        timeToMergeDays: 1,
        timeToMergeHours: 24,
        timeToFirstReviewHours: 6,
        changesRequested: 1,
        approvals: 1,
        commits: 2,
        reviewers: 1,
        humanReviewers: 1,
        comments: 3,
        humanComments: 1,
        additions: 100,
        deletions: 20,
        changedFiles: 4,
        aiTools: ['Claude'],
        aiCommitCount: 1,
      })
    })

    it('人類審查者應排除 bot', () => {
      const metrics = aggregator.measure(nonAiPr)

      expect(metrics.reviewers).toBe(2)
      expect(metrics.humanReviewers).toBe(1)
      expect(metrics.timeToFirstReviewHours).toBe(1)
      expect(metrics.comments).toBe(2)
      expect(metrics.humanComments).toBe(1)
    })

    it('尚未合併或沒有審查時應為 null', () => {
      const metrics = aggregator.measure(createPr('4', null))

      expect(metrics.timeToMergeDays).toBeNull()
      expect(metrics.timeToMergeHours).toBeNull()
      expect(metrics.timeToFirstReviewHours).toBeNull()
    })
  })

  describe('aggregate', () => {
    it('應計算 AI 採用率與分組平均', () => {
      const metrics = aggregator.aggregate([aiPr, nonAiPr, slowPr], { label: 'Phase 1' })

      expect(metrics.totalPrs).toBe(3)
      expect(metrics.aiAssistedPrs).toBe(1)
      expect(metrics.nonAiPrs).toBe(2)
      expect(metrics.aiAdoptionRate).toBeCloseTo(33.33, 2)
      expect(metrics.tools).toEqual([{ tool: 'Claude', prCount: 1 }])
      expect(metrics.overall.avgTimeToMergeDays).toBe(3)
      expect(metrics.ai.avgTimeToMergeDays).toBe(1)
      expect(metrics.nonAi.avgTimeToMergeDays).toBe(4)
      expect(metrics.mergeTimeImprovement).toBe(75)
      expect(metrics.changesRequestedReduction).toBe(50)
      expect(metrics.dateRange).toEqual({
        start: at('2024-01-02T00:00:00Z'),
        end: at('2024-01-06T00:00:00Z'),
        days: 4,
      })
    })

    it('應統計工具使用與多工具 PR', () => {
      const multi = createPr('5', '2024-01-03T00:00:00Z', { aiTools: ['Claude', 'Cursor'] })
      const metrics = aggregator.aggregate([aiPr, multi])

      expect(metrics.tools).toEqual([
        { tool: 'Claude', prCount: 2 },
        { tool: 'Cursor', prCount: 1 },
      ])
      expect(metrics.multiToolPrs).toBe(1)
      expect(metrics.aiAdoptionRate).toBe(100)
      expect(metrics.mergeTimeImprovement).toBeNull()
    })

    it('空世代應回傳不存在的指標', () => {
      const metrics = aggregator.aggregate([])

      expect(metrics.totalPrs).toBe(0)
      expect(metrics.aiAdoptionRate).toBeNull()
      expect(metrics.overall.count).toBe(0)
      expect(metrics.overall.avgTimeToMergeDays).toBeNull()
      expect(metrics.dateRange).toBeNull()
    })

    it('合併時間為負值時應記錄診斷資訊', () => {
      const metrics = aggregator.aggregate([createPr('6', '2023-12-31T00:00:00Z')])

      expect(metrics.diagnostics).toEqual([
        {
          itemId: '6',
          warnings: [
            {
              kind: 'negative-closure-time',
              itemId: '6',
              message: '6: 合併時間早於建立時間（-1.00 天）',
            },
          ],
        },
      ])
    })
  })
})
