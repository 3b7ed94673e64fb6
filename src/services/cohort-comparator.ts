/**
 * 世代比較器
 *
 * 將多個階段的指標依指標鍵值對齊成比較表，並標示每個階段相對前一階段的趨勢。
 * 階段順序由呼叫端決定，比較器不排序。
 *
 * 「不存在」不會產生數值差異：有值 → 不存在 標示為 no-longer-occurs，
 * 不存在 → 有值 標示為 newly-occurs。
 *
 * @module services/cohort-comparator
 */

import type {
  CohortComparison,
  ComparisonRow,
  MetricDefinition,
  MetricPolarity,
  PhaseDelta,
  Trend,
} from '../models/comparison.js'
import type { CohortMetricsBase } from '../models/phase-metrics.js'
import { AppError, ErrorType } from '../models/error.js'
import { percentageChange } from '../utils/statistics.js'

/**
 * 比較選項
 */
export interface CompareOptions {
  /** 限定的負責人；提供時每個階段都必須是以此負責人計算 */
  actor?: string | null
}

/**
 * 依方向性判斷趨勢
 */
export function determineTrend(change: number, polarity: MetricPolarity): Trend {
  if (change === 0) return 'unchanged'

  switch (polarity) {
    case 'lower-is-better':
      return change < 0 ? 'improved' : 'regressed'
    case 'higher-is-better':
      return change > 0 ? 'improved' : 'regressed'
    case 'neutral':
      return 'changed'
  }
}

/**
 * 計算相鄰兩階段的差異
 *
 * @example
 * ```typescript
 * compareValues(1.13, null, 'lower-is-better') // { kind: 'no-longer-occurs', previous: 1.13 }
 * ```
 */
export function compareValues(
  previous: number | null,
  current: number | null,
  polarity: MetricPolarity
): PhaseDelta {
  if (current === null) {
    return previous === null ? { kind: 'not-observed' } : { kind: 'no-longer-occurs', previous }
  }
  if (previous === null) return { kind: 'newly-occurs', current }

  const absoluteChange = current - previous
  return {
    kind: 'numeric',
    absoluteChange,
    percentChange: percentageChange(previous, current),
    trend: determineTrend(absoluteChange, polarity),
  }
}

/**
 * 世代比較器類別
 *
 * @typeParam M - 階段指標型別（issue 或 PR）
 */
export class CohortComparator<M extends CohortMetricsBase> {
  constructor(private readonly definitions: readonly MetricDefinition<M>[]) {}

  /**
   * 比較各階段
   *
   * @throws {AppError} 階段指標的負責人與比較範圍不一致時（INVALID_INPUT）
   */
  compare(phases: readonly M[], options: CompareOptions = {}): CohortComparison {
    const actor = options.actor ?? phases[0]?.actor ?? null
    this.assertSameActor(phases, actor)

    return {
      actor,
      phases: phases.map((p) => ({
        label: p.label,
        queryWindow: p.queryWindow,
        dateRange: p.dateRange,
      })),
      rows: this.definitions.map((definition) => this.buildRow(definition, phases)),
    }
  }

  private buildRow(definition: MetricDefinition<M>, phases: readonly M[]): ComparisonRow {
    const values = phases.map((p) => definition.extract(p))
    const deltas: PhaseDelta[] = []

    for (let i = 1; i < values.length; i++) {
      deltas.push(compareValues(values[i - 1] ?? null, values[i] ?? null, definition.polarity))
    }

    return {
      key: definition.key,
      label: definition.label,
      unit: definition.unit,
      polarity: definition.polarity,
      values,
      deltas,
    }
  }

  /**
   * 比較器不自行過濾，只確認輸入已是同一個世代範圍
   */
  private assertSameActor(phases: readonly M[], actor: string | null): void {
    const mismatched = phases.find((p) => p.actor !== actor)
    if (!mismatched) return

    throw new AppError(
      ErrorType.INVALID_INPUT,
      `階段「${mismatched.label}」的負責人為「${mismatched.actor ?? '整個團隊'}」，` +
        `與比較範圍「${actor ?? '整個團隊'}」不一致`
    )
  }
}
