/**
 * 階段指標表格格式化器
 *
 * 將單一世代的 issue 或 PR 指標格式化為終端表格輸出
 *
 * @module formatters/phase-metrics-table-formatter
 */

import Table from 'cli-table3'
import chalk from 'chalk'
import type {
  CohortMetricsBase,
  IssuePhaseMetrics,
  PullRequestPhaseMetrics,
} from '../models/phase-metrics.js'
import { PULL_REQUEST_AVERAGE_FIELDS } from '../services/metric-definitions.js'
import { formatCalendarDate } from '../utils/instant.js'
import { ABSENT_MARKER, formatMetricValue, formatNumber } from '../utils/formatters.js'

/**
 * 格式化標題（階段名稱、負責人、日期範圍）
 */
function formatHeader(title: string, metrics: CohortMetricsBase): string {
  const output: string[] = []
  const scope = metrics.actor ? `負責人：${metrics.actor}` : '整個團隊'
  output.push(chalk.bold.cyan(`\n${title}${metrics.label ? `：${metrics.label}` : ''}（${scope}）`))

  if (metrics.queryWindow) {
    output.push(
      `查詢區間：${formatCalendarDate(metrics.queryWindow.start)} ~ ${formatCalendarDate(metrics.queryWindow.end)}`
    )
  }

  output.push(
    metrics.dateRange
      ? `實際範圍：${formatCalendarDate(metrics.dateRange.start)} ~ ${formatCalendarDate(metrics.dateRange.end)}` +
          `（${formatMetricValue(metrics.dateRange.days, 'days')}）`
      : `實際範圍：${ABSENT_MARKER}`
  )

  return output.join('\n')
}

/**
 * 格式化「項目 / 值」兩欄表格
 */
function formatKeyValueTable(rows: Array<[string, string]>): string {
  const table = new Table({
    head: [chalk.bold('指標'), chalk.bold('值')],
  })
  for (const row of rows) {
    table.push(row)
  }
  return table.toString()
}

/**
 * 階段指標表格格式化器
 */
export class PhaseMetricsTableFormatter {
  /**
   * 格式化 issue 階段指標
   */
  formatIssues(metrics: IssuePhaseMetrics): string {
    const output: string[] = [formatHeader('Issue 階段指標', metrics)]

    output.push(
      formatKeyValueTable([
        ['Issue 數', formatNumber(metrics.itemCount)],
        ['已解決', formatNumber(metrics.closure.resolvedCount)],
        ['平均結案時間', formatMetricValue(metrics.closure.averageDays, 'days')],
        ['最短結案時間', formatMetricValue(metrics.closure.minDays, 'days')],
        ['最長結案時間', formatMetricValue(metrics.closure.maxDays, 'days')],
        ['每日吞吐量', formatMetricValue(metrics.throughputPerDay, 'per-day')],
        ['資料跨度', formatMetricValue(metrics.dataSpanDays, 'days')],
      ])
    )

    output.push(chalk.bold.cyan('\n各狀態停留時間：'))
    const stateTable = new Table({
      head: [
        chalk.bold('狀態'),
        chalk.bold('進入項目數'),
        chalk.bold('總進入次數'),
        chalk.bold('平均停留'),
        chalk.bold('重複進入率'),
      ],
    })
    for (const state of metrics.states) {
      const rate = formatMetricValue(state.reentryRate, 'ratio')
      stateTable.push([
        state.state,
        formatNumber(state.itemsEntered),
        formatNumber(state.totalEntries),
        formatMetricValue(state.averageDays, 'days'),
        state.bouncing ? chalk.yellow(`${rate} ⚠`) : rate,
      ])
    }
    output.push(stateTable.toString())

    if (metrics.typeDistribution.length > 0) {
      output.push(chalk.bold.cyan('\n類型分佈：'))
      const typeTable = new Table({
        head: [chalk.bold('類型'), chalk.bold('數量'), chalk.bold('比例')],
      })
      for (const share of metrics.typeDistribution) {
        typeTable.push([share.type, formatNumber(share.count), formatMetricValue(share.percentage, 'percent')])
      }
      output.push(typeTable.toString())
    }

    if (metrics.diagnostics.length > 0) {
      output.push(chalk.yellow(`\n⚠ ${metrics.diagnostics.length} 個項目有資料品質警告（使用 --verbose 查看）`))
    }

    return output.join('\n')
  }

  /**
   * 格式化 PR 階段指標
   */
  formatPullRequests(metrics: PullRequestPhaseMetrics): string {
    const output: string[] = [formatHeader('PR 階段指標', metrics)]

    const summary: Array<[string, string]> = [
      ['合併的 PR 數（排除 bot）', formatNumber(metrics.totalPrs)],
      ['AI 輔助 PR', formatNumber(metrics.aiAssistedPrs)],
      ['非 AI PR', formatNumber(metrics.nonAiPrs)],
      ['AI 採用率', formatMetricValue(metrics.aiAdoptionRate, 'percent')],
    ]
    for (const usage of metrics.tools) {
      summary.push([`${usage.tool} PR`, formatNumber(usage.prCount)])
    }
    summary.push(
      ['多工具 PR', formatNumber(metrics.multiToolPrs)],
      ['AI 合併時間改善', formatMetricValue(metrics.mergeTimeImprovement, 'percent')],
      ['AI 要求修改減少', formatMetricValue(metrics.changesRequestedReduction, 'percent')]
    )
    output.push(formatKeyValueTable(summary))

    output.push(chalk.bold.cyan('\n平均值：'))
    const averageTable = new Table({
      head: [chalk.bold('指標'), chalk.bold('整體'), chalk.bold('AI'), chalk.bold('非 AI')],
    })
    for (const { field, label, unit } of PULL_REQUEST_AVERAGE_FIELDS) {
      averageTable.push([
        label,
        formatMetricValue(metrics.overall[field], unit),
        formatMetricValue(metrics.ai[field], unit),
        formatMetricValue(metrics.nonAi[field], unit),
      ])
    }
    output.push(averageTable.toString())

    if (metrics.diagnostics.length > 0) {
      output.push(chalk.yellow(`\n⚠ ${metrics.diagnostics.length} 個 PR 有資料品質警告（使用 --verbose 查看）`))
    }

    return output.join('\n')
  }
}
