/**
 * 世代比較表格格式化器
 *
 * 將跨階段比較結果格式化為終端表格：每列一個指標、每欄一個階段，
 * 第二個階段起在數值下方標示相對前一階段的變化。
 *
 * @module formatters/comparison-table-formatter
 */

import Table from 'cli-table3'
import chalk from 'chalk'
import type { CohortComparison, KeyChange, KeyChangeSummary, PhaseDelta } from '../models/comparison.js'
import { formatCalendarDate } from '../utils/instant.js'
import {
  ABSENT_MARKER,
  formatDelta,
  formatMetricValue,
  formatPercentChange,
} from '../utils/formatters.js'

/**
 * 依趨勢上色
 */
function colorizeDelta(delta: PhaseDelta, text: string): string {
  if (delta.kind !== 'numeric') return chalk.gray(text)

  switch (delta.trend) {
    case 'improved':
      return chalk.green(text)
    case 'regressed':
      return chalk.red(text)
    default:
      return chalk.gray(text)
  }
}

function formatKeyChange(change: KeyChange): string {
  return (
    `  • ${change.label}: ${formatMetricValue(change.before, change.unit)} → ` +
    `${formatMetricValue(change.after, change.unit)} (${formatPercentChange(change.percentChange)})`
  )
}

/**
 * 世代比較表格格式化器
 */
export class ComparisonTableFormatter {
  /**
   * 格式化比較結果
   *
   * @param comparison - 比較結果
   * @param keyChanges - 重點變化摘要（選擇性）
   */
  format(comparison: CohortComparison, keyChanges?: KeyChangeSummary): string {
    const output: string[] = []
    const scope = comparison.actor ? `負責人：${comparison.actor}` : '整個團隊'
    output.push(chalk.bold.cyan(`\n階段比較（${scope}）`))

    comparison.phases.forEach((phase, index) => {
      const window = phase.queryWindow
        ? `${formatCalendarDate(phase.queryWindow.start)} ~ ${formatCalendarDate(phase.queryWindow.end)}`
        : ABSENT_MARKER
      const range = phase.dateRange
        ? `${formatCalendarDate(phase.dateRange.start)} ~ ${formatCalendarDate(phase.dateRange.end)}`
        : ABSENT_MARKER
      output.push(`  階段 ${index + 1}：${phase.label}（查詢區間 ${window}，實際範圍 ${range}）`)
    })

    const table = new Table({
      head: [chalk.bold('指標'), ...comparison.phases.map((p) => chalk.bold(p.label))],
    })

    for (const row of comparison.rows) {
      const cells = row.values.map((value, index) => {
        const text = formatMetricValue(value, row.unit)
        const delta = index > 0 ? row.deltas[index - 1] : undefined
        return delta ? `${text}\n${colorizeDelta(delta, formatDelta(delta, row.unit))}` : text
      })
      table.push([row.label, ...cells])
    }

    output.push(table.toString())

    if (keyChanges) {
      output.push(chalk.bold.cyan('\n主要增加：'))
      output.push(
        keyChanges.increases.length > 0
          ? keyChanges.increases.map(formatKeyChange).join('\n')
          : '  • 沒有增加的指標'
      )
      output.push(chalk.bold.cyan('\n主要減少：'))
      output.push(
        keyChanges.decreases.length > 0
          ? keyChanges.decreases.map(formatKeyChange).join('\n')
          : '  • 沒有減少的指標'
      )
    }

    return output.join('\n')
  }
}
