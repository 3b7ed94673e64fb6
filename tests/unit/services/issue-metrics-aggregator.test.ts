import { describe, it, expect } from 'vitest'
import {
  IssueMetricsAggregator,
  averageStateTime,
  closureTimeDays,
  deriveDateRange,
  getItemAnalysis,
  reentryRate,
  throughputPerDay,
  typeDistribution,
} from '../../../src/services/issue-metrics-aggregator.js'
import { StateHistoryReconstructor } from '../../../src/services/state-history-reconstructor.js'
import type { IssueWorkItem } from '../../../src/models/work-item.js'
import { AppError, ErrorType } from '../../../src/models/error.js'
import { parseInstant } from '../../../src/utils/instant.js'

/**
 * Issue 指標聚合器單元測試
 */
describe('IssueMetricsAggregator', () => {
  const at = (raw: string) => parseInstant(raw)

  // Helper: 建立 issue，transitions 以 [狀態, 日期] 表示
  const createIssue = (
    id: string,
    createdAt: string,
    resolvedAt: string | null,
    transitions: Array<[string, string]>,
    overrides: Partial<IssueWorkItem> = {}
  ): IssueWorkItem => ({
    kind: 'issue',
    id,
    createdAt: at(createdAt),
    resolvedAt: resolvedAt ? at(resolvedAt) : null,
    actor: 'jdoe',
    aiTools: [],
    type: 'Story',
    currentState: null,
    transitions: transitions.map(([toState, raw]) => ({ toState, at: at(raw) })),
    ...overrides,
  })

  const itemA = createIssue(
    'A-1',
    '2024-01-01',
    '2024-01-05',
    [
      ['New', '2024-01-01'],
      ['In Progress', '2024-01-02'],
      ['Done', '2024-01-05'],
    ],
    { type: 'Bug' }
  )

  const itemB = createIssue('A-2', '2024-01-03', '2024-01-09', [
    ['New', '2024-01-03'],
    ['In Progress', '2024-01-04'],
    ['Waiting', '2024-01-05'],
    ['In Progress', '2024-01-07'],
    ['Done', '2024-01-09'],
  ])

  describe('closureTimeDays', () => {
    it('應計算建立到解決的天數', () => {
      expect(closureTimeDays(itemA)).toBe(4)
    })

    it('尚未解決時應回傳 null', () => {
      expect(closureTimeDays({ ...itemA, resolvedAt: null })).toBeNull()
    })
  })

  describe('averageStateTime / reentryRate', () => {
    const reconstructor = new StateHistoryReconstructor()
    const histories = [itemA, itemB].map((item) =>
      reconstructor.reconstruct({
        itemId: item.id,
        transitions: item.transitions,
        observationEnd: item.resolvedAt ?? undefined,
      })
    )

    it('單一項目的狀態停留時間', () => {
      expect(averageStateTime(histories.slice(0, 1), 'New')).toBe(1)
      expect(averageStateTime(histories.slice(0, 1), 'In Progress')).toBe(3)
      expect(reentryRate(histories.slice(0, 1), 'In Progress')).toBe(1)
    })

    it('分母應為進入過該狀態的項目數而非世代總數', () => {
      expect(averageStateTime(histories, 'Waiting')).toBe(2)
    })

    it('只計入已關閉的區間', () => {
      const openHistory = reconstructor.reconstruct({
        itemId: 'A-9',
        transitions: [
          { toState: 'New', at: at('2024-01-01') },
          { toState: 'Waiting', at: at('2024-01-02') },
        ],
      })

      expect(averageStateTime([openHistory], 'Waiting')).toBeNull()
      expect(averageStateTime([openHistory, ...histories], 'Waiting')).toBe(2)
    })

    it('重複進入應提高重複進入率', () => {
      expect(reentryRate(histories, 'In Progress')).toBe(1.5)
    })

    it('沒有項目進入的狀態應回傳 null 而非 0', () => {
      expect(averageStateTime(histories, 'Release Pending')).toBeNull()
      expect(reentryRate(histories, 'Release Pending')).toBeNull()
    })
  })

  describe('deriveDateRange / throughputPerDay', () => {
    it('應以最早與最晚解決時間推導範圍', () => {
      const range = deriveDateRange([itemA, itemB])

      expect(range).toEqual({ start: at('2024-01-05'), end: at('2024-01-09'), days: 4 })
      expect(throughputPerDay(2, range)).toBe(0.5)
    })

    it('沒有已解決項目時範圍與吞吐量皆為 null', () => {
      const range = deriveDateRange([{ ...itemA, resolvedAt: null }])

      expect(range).toBeNull()
      expect(throughputPerDay(1, range)).toBeNull()
    })

    it('跨度為 0 時吞吐量為 null', () => {
      expect(throughputPerDay(1, deriveDateRange([itemA]))).toBeNull()
    })
  })

  describe('typeDistribution', () => {
    it('未知類型應自成一項並計入分母', () => {
      const unknown = createIssue('A-3', '2024-01-01', null, [], { type: null })
      const story = createIssue('A-4', '2024-01-01', null, [])

      expect(typeDistribution([itemA, itemB, unknown, story])).toEqual([
        { type: 'Story', count: 2, percentage: 50 },
        { type: 'Bug', count: 1, percentage: 25 },
        { type: 'Unknown', count: 1, percentage: 25 },
      ])
    })

    it('空世代應回傳空陣列', () => {
      expect(typeDistribution([])).toEqual([])
    })
  })

  describe('aggregate', () => {
    it('應聚合整個世代', () => {
      const metrics = new IssueMetricsAggregator().aggregate([itemA, itemB], { label: 'Phase 1' })

      expect(metrics.label).toBe('Phase 1')
      expect(metrics.itemCount).toBe(2)
      expect(metrics.closure).toEqual({
        resolvedCount: 2,
        averageDays: 5,
        averageHours: 120,
        minDays: 4,
        maxDays: 6,
      })
      expect(metrics.throughputPerDay).toBe(0.5)
      expect(metrics.dataSpanDays).toBe(8)
      expect(metrics.states.map((s) => s.state)).toEqual([
        'New',
        'To Do',
        'In Progress',
        'Review',
        'Release Pending',
        'Waiting',
        'Done',
      ])
      expect(metrics.typeDistribution.map((t) => t.type)).toEqual(['Bug', 'Story'])
      expect(metrics.diagnostics).toEqual([])
    })

    it('應計算各狀態統計', () => {
      const metrics = new IssueMetricsAggregator().aggregate([itemA, itemB])
      const inProgress = metrics.states.find((s) => s.state === 'In Progress')
      const toDo = metrics.states.find((s) => s.state === 'To Do')

      expect(inProgress).toEqual({
        state: 'In Progress',
        itemsEntered: 2,
        totalEntries: 3,
        totalDays: 6,
        averageDays: 3,
        reentryRate: 1.5,
        bouncing: false,
      })
      expect(toDo).toEqual({
        state: 'To Do',
        itemsEntered: 0,
        totalEntries: 0,
        totalDays: 0,
        averageDays: null,
        reentryRate: null,
        bouncing: false,
      })
    })

    it('重複進入率超過閾值時應標記', () => {
      const metrics = new IssueMetricsAggregator({ reentryWarningThreshold: 1.2 }).aggregate([
        itemA,
        itemB,
      ])

      expect(metrics.states.find((s) => s.state === 'In Progress')?.bouncing).toBe(true)
    })

    it('空世代應回傳不存在的指標而非 0', () => {
      const metrics = new IssueMetricsAggregator({ trackedStates: ['New'] }).aggregate([])

      expect(metrics.itemCount).toBe(0)
      expect(metrics.closure.averageDays).toBeNull()
      expect(metrics.throughputPerDay).toBeNull()
      expect(metrics.dataSpanDays).toBeNull()
      expect(metrics.dateRange).toBeNull()
      expect(metrics.states).toEqual([
        {
          state: 'New',
          itemsEntered: 0,
          totalEntries: 0,
          totalDays: 0,
          averageDays: null,
          reentryRate: null,
          bouncing: false,
        },
      ])
      expect(metrics.typeDistribution).toEqual([])
    })

    it('未解決項目應以 asOf 作為觀察終點', () => {
      const open = createIssue('A-5', '2024-01-01', null, [
        ['New', '2024-01-01'],
        ['In Progress', '2024-01-02'],
      ])
      const metrics = new IssueMetricsAggregator({ trackedStates: [] }).aggregate([open], {
        asOf: at('2024-01-04'),
      })

      expect(metrics.states.find((s) => s.state === 'In Progress')?.averageDays).toBe(2)
      expect(metrics.closure.resolvedCount).toBe(0)
    })

    it('沒有觀察終點時，只有開放區間的狀態平均停留應為 null', () => {
      const open = createIssue('A-8', '2024-01-01', null, [
        ['New', '2024-01-01'],
        ['Waiting', '2024-01-02'],
      ])
      const metrics = new IssueMetricsAggregator({ trackedStates: [] }).aggregate([open])
      const waiting = metrics.states.find((s) => s.state === 'Waiting')

      expect(waiting?.itemsEntered).toBe(1)
      expect(waiting?.averageDays).toBeNull()
      expect(metrics.states.find((s) => s.state === 'New')?.averageDays).toBe(1)
    })

    it('開放區間不應稀釋已關閉區間的平均停留', () => {
      const open = createIssue('A-8', '2024-01-01', null, [
        ['New', '2024-01-01'],
        ['Waiting', '2024-01-02'],
      ])
      const metrics = new IssueMetricsAggregator({ trackedStates: [] }).aggregate([open, itemB])
      const waiting = metrics.states.find((s) => s.state === 'Waiting')

      expect(waiting?.itemsEntered).toBe(2)
      expect(waiting?.averageDays).toBe(2)
    })

    it('沒有轉換紀錄時應以目前狀態作為初始狀態', () => {
      const item = createIssue('A-6', '2024-01-01', null, [], { currentState: 'To Do' })
      const metrics = new IssueMetricsAggregator({ trackedStates: [] }).aggregate([item], {
        asOf: at('2024-01-03'),
      })

      expect(metrics.states).toHaveLength(1)
      expect(metrics.states[0]?.state).toBe('To Do')
      expect(metrics.states[0]?.averageDays).toBe(2)
    })

    it('解決時間早於建立時間應記錄診斷資訊', () => {
      const item = createIssue('A-7', '2024-01-05', '2024-01-03', [])
      const metrics = new IssueMetricsAggregator().aggregate([item])

      expect(metrics.closure.averageDays).toBe(-2)
      expect(metrics.diagnostics).toHaveLength(1)
      expect(metrics.diagnostics[0]?.warnings[0]?.kind).toBe('negative-closure-time')
    })
  })

  describe('getItemAnalysis', () => {
    const analyses = new IssueMetricsAggregator().analyzeItems([itemA, itemB])

    it('應取得單一項目的分析結果', () => {
      expect(getItemAnalysis(analyses, 'A-2').closureDays).toBe(6)
    })

    it('找不到項目時應拋出 ITEM_NOT_FOUND', () => {
      expect(() => getItemAnalysis(analyses, 'A-99')).toThrow(AppError)
      try {
        getItemAnalysis(analyses, 'A-99')
      } catch (error) {
        expect(error instanceof AppError && error.type).toBe(ErrorType.ITEM_NOT_FOUND)
      }
    })
  })
})
