/**
 * 重點變化摘要
 *
 * 比較第一個與最後一個階段，列出百分比變化最大的增加與減少項目。
 * 任一端不存在、或基準為 0 的指標不列入。
 *
 * @module services/key-change-summarizer
 */

import type { CohortComparison, KeyChange, KeyChangeSummary } from '../models/comparison.js'
import { DEFAULT_KEY_CHANGE_COUNT } from '../constants/analysis-defaults.js'
import { percentageChange } from '../utils/statistics.js'

/**
 * 產生重點變化摘要
 *
 * 依變化幅度由大到小排序；幅度相同時保留比較表中的順序。
 *
 * @param topN - 增加與減少各列出的數量
 */
export function summarizeKeyChanges(
  comparison: CohortComparison,
  topN: number = DEFAULT_KEY_CHANGE_COUNT
): KeyChangeSummary {
  const changes: KeyChange[] = []

  for (const row of comparison.rows) {
    if (row.values.length < 2) continue

    const before = row.values[0] ?? null
    const after = row.values[row.values.length - 1] ?? null
    if (before === null || after === null) continue

    const change = percentageChange(before, after)
    if (change === null) continue

    changes.push({ key: row.key, label: row.label, unit: row.unit, before, after, percentChange: change })
  }

  const byMagnitude = (a: KeyChange, b: KeyChange): number =>
    Math.abs(b.percentChange) - Math.abs(a.percentChange)

  return {
    increases: changes.filter((c) => c.percentChange > 0).sort(byMagnitude).slice(0, topN),
    decreases: changes.filter((c) => c.percentChange < 0).sort(byMagnitude).slice(0, topN),
  }
}
