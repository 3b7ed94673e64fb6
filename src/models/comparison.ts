/**
 * 世代比較資料模型
 */

import type { DerivedDateRange, QueryWindow } from './phase-metrics.js'

/**
 * 指標方向性
 */
export type MetricPolarity = 'lower-is-better' | 'higher-is-better' | 'neutral'

/**
 * 指標單位（決定顯示格式）
 */
export type MetricUnit = 'days' | 'hours' | 'count' | 'percent' | 'ratio' | 'per-day' | 'lines'

/**
 * 指標定義：由一組階段指標中取出單一數值
 *
 * @typeParam M - 階段指標型別
 */
export interface MetricDefinition<M> {
  /** 穩定鍵值（對齊各階段用） */
  key: string
  label: string
  unit: MetricUnit
  polarity: MetricPolarity
  /** 取值；null 代表不存在 */
  extract: (metrics: M) => number | null
}

/**
 * 與前一階段相比的趨勢
 *
 * neutral 指標只會是 changed 或 unchanged。
 */
export type Trend = 'improved' | 'regressed' | 'unchanged' | 'changed'

/**
 * 相鄰兩階段之間的差異
 */
export type PhaseDelta =
  | {
      kind: 'numeric'
      /** current - previous */
      absoluteChange: number
      /** 基準為 0 時為 null */
      percentChange: number | null
      trend: Trend
    }
  /** 前一階段有值、本階段不存在 */
  | { kind: 'no-longer-occurs'; previous: number }
  /** 前一階段不存在、本階段有值 */
  | { kind: 'newly-occurs'; current: number }
  /** 兩階段皆不存在 */
  | { kind: 'not-observed' }

/**
 * 比較表的一列
 */
export interface ComparisonRow {
  key: string
  label: string
  unit: MetricUnit
  polarity: MetricPolarity
  /** 各階段的值（依階段順序） */
  values: Array<number | null>
  /** deltas[i] 為 values[i + 1] 相對 values[i] 的差異 */
  deltas: PhaseDelta[]
}

/**
 * 比較表的一欄
 */
export interface PhaseColumn {
  label: string
  queryWindow: QueryWindow | null
  dateRange: DerivedDateRange | null
}

/**
 * 世代比較結果
 */
export interface CohortComparison {
  /** 限定的負責人（整個團隊則為 null） */
  actor: string | null
  phases: PhaseColumn[]
  rows: ComparisonRow[]
}

/**
 * 首尾階段之間的重點變化
 */
export interface KeyChange {
  key: string
  label: string
  unit: MetricUnit
  before: number
  after: number
  percentChange: number
}

/**
 * 重點變化摘要
 */
export interface KeyChangeSummary {
  increases: KeyChange[]
  decreases: KeyChange[]
}
