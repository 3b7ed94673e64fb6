/**
 * Issue 指標聚合器
 *
 * 將同一世代（階段 × 選擇性負責人）的 issue 聚合為階段指標：
 * 結案時間、各狀態平均停留時間、重複進入率、吞吐量與類型分佈。
 *
 * 除以零一律回傳 null（不存在），不拋出例外，也不回傳 0。
 *
 * @module services/issue-metrics-aggregator
 */

import type { IssueWorkItem, WorkItemBase } from '../models/work-item.js'
import { UNKNOWN_TYPE } from '../models/work-item.js'
import type { DataQualityWarning, StateHistory } from '../models/state-history.js'
import type {
  ClosureTimeStatistics,
  DerivedDateRange,
  IssuePhaseMetrics,
  QueryWindow,
  StateMetric,
  TypeShare,
} from '../models/phase-metrics.js'
import { AppError, ErrorType } from '../models/error.js'
import { StateHistoryReconstructor } from './state-history-reconstructor.js'
import {
  DEFAULT_REENTRY_WARNING_THRESHOLD,
  DEFAULT_TRACKED_STATES,
} from '../constants/analysis-defaults.js'
import { durationDays } from '../utils/instant.js'
import { max, mean, min, present, ratio, sum } from '../utils/statistics.js'

/**
 * 聚合器設定
 */
export interface IssueMetricsAggregatorOptions {
  /** 即使沒有項目進入也要列出的狀態 */
  trackedStates?: readonly string[]
  /** 已知狀態（提供時對未知狀態發出警告） */
  knownStates?: readonly string[]
  /** 沒有轉換紀錄且沒有目前狀態時的初始狀態 */
  defaultInitialState?: string
  reentryWarningThreshold?: number
}

/**
 * 聚合情境
 */
export interface CohortContext {
  label?: string
  actor?: string | null
  queryWindow?: QueryWindow | null
  /** 未解決項目的觀察終點（呼叫端提供的「現在」） */
  asOf?: Date
}

/**
 * 單一項目的分析結果
 */
export interface ItemAnalysis {
  item: IssueWorkItem
  closureDays: number | null
  history: StateHistory
  warnings: DataQualityWarning[]
}

/**
 * 計算結案時間（天）
 *
 * @returns 尚未解決時返回 null
 */
export function closureTimeDays(item: WorkItemBase): number | null {
  return item.resolvedAt ? durationDays(item.createdAt, item.resolvedAt) : null
}

/**
 * 計算狀態平均停留時間（天）
 *
 * 分母為「在該狀態有已關閉區間的項目數」，而非世代總數。
 * 仍開放的區間（沒有觀察終點）沒有停留時間，不列入分子或分母。
 *
 * @returns 沒有項目在該狀態留下已關閉區間時返回 null
 */
export function averageStateTime(histories: readonly StateHistory[], state: string): number | null {
  let totalDays = 0
  let itemsMeasured = 0

  for (const history of histories) {
    const closed = present((history.intervalsByState[state] ?? []).map((i) => i.durationDays))
    if (closed.length === 0) continue
    itemsMeasured += 1
    totalDays += sum(closed)
  }

  return ratio(totalDays, itemsMeasured)
}

/**
 * 計算重複進入率（總進入次數 / 進入過的項目數）
 *
 * @returns 沒有項目進入該狀態時返回 null；1.0 表示沒有任何項目重複進入
 */
export function reentryRate(histories: readonly StateHistory[], state: string): number | null {
  let totalEntries = 0
  let itemsEntered = 0

  for (const history of histories) {
    const visit = history.states.find((s) => s.state === state)
    if (!visit) continue
    itemsEntered += 1
    totalEntries += visit.entries
  }

  return ratio(totalEntries, itemsEntered)
}

/**
 * 由實際解決時間推導日期範圍
 *
 * @returns 沒有任何已解決項目時返回 null
 */
export function deriveDateRange(items: readonly WorkItemBase[]): DerivedDateRange | null {
  let start: Date | null = null
  let end: Date | null = null

  for (const item of items) {
    const resolvedAt = item.resolvedAt
    if (!resolvedAt) continue
    if (!start || resolvedAt.getTime() < start.getTime()) start = resolvedAt
    if (!end || resolvedAt.getTime() > end.getTime()) end = resolvedAt
  }

  if (!start || !end) return null
  return { start, end, days: durationDays(start, end) }
}

/**
 * 計算每日吞吐量
 *
 * @returns 範圍不存在或跨度為 0 時返回 null
 */
export function throughputPerDay(count: number, range: DerivedDateRange | null): number | null {
  if (!range || range.days <= 0) return null
  return count / range.days
}

/**
 * 計算類型分佈（所有項目皆計入分母，未知類型自成一項）
 *
 * 依數量遞減、類型名稱遞增排序。
 */
export function typeDistribution(items: readonly IssueWorkItem[]): TypeShare[] {
  if (items.length === 0) return []

  const counts = new Map<string, number>()
  for (const item of items) {
    const type = item.type ?? UNKNOWN_TYPE
    counts.set(type, (counts.get(type) ?? 0) + 1)
  }

  return [...counts.entries()]
    .map(([type, count]) => ({ type, count, percentage: (count / items.length) * 100 }))
    .sort((a, b) => b.count - a.count || (a.type < b.type ? -1 : a.type > b.type ? 1 : 0))
}

/**
 * 從分析結果中取得單一項目
 *
 * @throws {AppError} 找不到該項目時（ITEM_NOT_FOUND）
 */
export function getItemAnalysis(analyses: readonly ItemAnalysis[], itemId: string): ItemAnalysis {
  const found = analyses.find((a) => a.item.id === itemId)
  if (!found) {
    throw new AppError(ErrorType.ITEM_NOT_FOUND, `找不到項目：${itemId}`)
  }
  return found
}

/**
 * Issue 指標聚合器類別
 */
export class IssueMetricsAggregator {
  private readonly trackedStates: readonly string[]
  private readonly reentryWarningThreshold: number
  private readonly reconstructor: StateHistoryReconstructor

  constructor(options: IssueMetricsAggregatorOptions = {}) {
    this.trackedStates = options.trackedStates ?? DEFAULT_TRACKED_STATES
    this.reentryWarningThreshold =
      options.reentryWarningThreshold ?? DEFAULT_REENTRY_WARNING_THRESHOLD
    this.reconstructor = new StateHistoryReconstructor({
      knownStates: options.knownStates,
      defaultInitialState: options.defaultInitialState,
    })
  }

  /**
   * 逐項重建狀態歷程並計算結案時間
   *
   * @param asOf - 未解決項目的觀察終點
   */
  analyzeItems(items: readonly IssueWorkItem[], asOf?: Date): ItemAnalysis[] {
    return items.map((item) => {
      const history = this.reconstructor.reconstruct({
        itemId: item.id,
        transitions: item.transitions,
        createdAt: item.createdAt,
        observationEnd: item.resolvedAt ?? asOf,
        defaultInitialState: item.currentState ?? undefined,
      })

      const closureDays = closureTimeDays(item)
      const warnings = [...history.warnings]

      if (closureDays !== null && closureDays < 0) {
        warnings.push({
          kind: 'negative-closure-time',
          itemId: item.id,
          at: item.resolvedAt ?? undefined,
          message: `${item.id}: 解決時間早於建立時間（${closureDays.toFixed(2)} 天）`,
        })
      }

      return { item, closureDays, history, warnings }
    })
  }

  /**
   * 聚合單一世代
   *
   * @example
   * ```typescript
   * const metrics = new IssueMetricsAggregator().aggregate(items, { label: 'Phase 1' })
   * metrics.closure.averageDays   // 4
   * metrics.states[0].reentryRate // 1
   * ```
   */
  aggregate(items: readonly IssueWorkItem[], context: CohortContext = {}): IssuePhaseMetrics {
    const analyses = this.analyzeItems(items, context.asOf)
    const histories = analyses.map((a) => a.history)
    const dateRange = deriveDateRange(items)

    return {
      kind: 'issue',
      label: context.label ?? '',
      actor: context.actor ?? null,
      queryWindow: context.queryWindow ?? null,
      dateRange,
      itemCount: items.length,
      closure: this.closureStatistics(analyses),
      throughputPerDay: throughputPerDay(items.length, dateRange),
      dataSpanDays: this.dataSpanDays(items),
      states: this.orderedStates(histories).map((state) => this.stateMetric(histories, state)),
      typeDistribution: typeDistribution(items),
      diagnostics: analyses
        .filter((a) => a.warnings.length > 0)
        .map((a) => ({ itemId: a.item.id, warnings: a.warnings })),
    }
  }

  private closureStatistics(analyses: readonly ItemAnalysis[]): ClosureTimeStatistics {
    const closures = present(analyses.map((a) => a.closureDays))
    const averageDays = mean(closures)

    return {
      resolvedCount: closures.length,
      averageDays,
      averageHours: averageDays === null ? null : averageDays * 24,
      minDays: min(closures),
      maxDays: max(closures),
    }
  }

  /**
   * 最早建立（已解決項目）到最晚解決的天數
   */
  private dataSpanDays(items: readonly IssueWorkItem[]): number | null {
    const resolved = items.filter((i) => i.resolvedAt !== null)
    const range = deriveDateRange(resolved)
    if (!range) return null

    let earliestCreated = resolved[0]?.createdAt ?? range.start
    for (const item of resolved) {
      if (item.createdAt.getTime() < earliestCreated.getTime()) earliestCreated = item.createdAt
    }

    return durationDays(earliestCreated, range.end)
  }

  /**
   * 追蹤中的狀態在前，其他觀察到的狀態依首次出現順序
   */
  private orderedStates(histories: readonly StateHistory[]): string[] {
    const ordered = [...this.trackedStates]
    const seen = new Set(ordered)

    for (const history of histories) {
      for (const visit of history.states) {
        if (seen.has(visit.state)) continue
        seen.add(visit.state)
        ordered.push(visit.state)
      }
    }

    return ordered
  }

  private stateMetric(histories: readonly StateHistory[], state: string): StateMetric {
    let itemsEntered = 0
    let totalEntries = 0
    let totalDays = 0

    for (const history of histories) {
      const visit = history.states.find((s) => s.state === state)
      if (!visit) continue
      itemsEntered += 1
      totalEntries += visit.entries
      totalDays += visit.totalDays
    }

    const rate = reentryRate(histories, state)

    return {
      state,
      itemsEntered,
      totalEntries,
      totalDays,
      averageDays: averageStateTime(histories, state),
      reentryRate: rate,
      bouncing: rate !== null && rate > this.reentryWarningThreshold,
    }
  }
}
