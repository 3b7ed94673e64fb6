/**
 * 比較用的指標定義
 *
 * 狀態與類型是動態的：由所有階段中觀察到的值組成，
 * 讓缺少某狀態的階段得到「不存在」而不是被略過。
 *
 * @module services/metric-definitions
 */

import type { MetricDefinition, MetricPolarity, MetricUnit } from '../models/comparison.js'
import type {
  IssuePhaseMetrics,
  PullRequestAverages,
  PullRequestPhaseMetrics,
} from '../models/phase-metrics.js'

/**
 * 依首次出現順序合併多個清單
 */
function union(lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>()
  const merged: string[] = []
  for (const list of lists) {
    for (const value of list) {
      if (seen.has(value)) continue
      seen.add(value)
      merged.push(value)
    }
  }
  return merged
}

/**
 * 建立 issue 指標定義
 */
export function issueMetricDefinitions(
  phases: readonly IssuePhaseMetrics[]
): MetricDefinition<IssuePhaseMetrics>[] {
  const states = union(phases.map((p) => p.states.map((s) => s.state)))
  const types = union(phases.map((p) => p.typeDistribution.map((t) => t.type)))

  const definitions: MetricDefinition<IssuePhaseMetrics>[] = [
    {
      key: 'itemCount',
      label: 'Issue 數',
      unit: 'count',
      polarity: 'neutral',
      extract: (m) => m.itemCount,
    },
    {
      key: 'closure.averageDays',
      label: '平均結案時間',
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.closure.averageDays,
    },
    {
      key: 'closure.maxDays',
      label: '最長結案時間',
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.closure.maxDays,
    },
    {
      key: 'throughputPerDay',
      label: '每日吞吐量',
      unit: 'per-day',
      polarity: 'higher-is-better',
      extract: (m) => m.throughputPerDay,
    },
    {
      key: 'dataSpanDays',
      label: '資料跨度',
      unit: 'days',
      polarity: 'neutral',
      extract: (m) => m.dataSpanDays,
    },
  ]

  for (const state of states) {
    definitions.push({
      key: `state.${state}.averageDays`,
      label: `${state} 平均停留`,
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.states.find((s) => s.state === state)?.averageDays ?? null,
    })
  }

  for (const state of states) {
    definitions.push({
      key: `state.${state}.reentryRate`,
      label: `${state} 重複進入率`,
      unit: 'ratio',
      polarity: 'lower-is-better',
      extract: (m) => m.states.find((s) => s.state === state)?.reentryRate ?? null,
    })
  }

  for (const type of types) {
    definitions.push({
      key: `type.${type}`,
      label: `${type} 比例`,
      unit: 'percent',
      polarity: 'neutral',
      // 有項目但沒有此類型是真正的 0%
      extract: (m) =>
        m.itemCount === 0
          ? null
          : (m.typeDistribution.find((t) => t.type === type)?.percentage ?? 0),
    })
  }

  return definitions
}

/**
 * PR 平均值欄位的顯示設定
 */
export const PULL_REQUEST_AVERAGE_FIELDS: ReadonlyArray<{
  field: Exclude<keyof PullRequestAverages, 'count'>
  label: string
  unit: MetricUnit
  polarity: MetricPolarity
}> = [
  { field: 'avgTimeToMergeDays', label: '平均合併時間', unit: 'days', polarity: 'lower-is-better' },
  { field: 'avgTimeToFirstReviewHours', label: '平均首次審查時間', unit: 'hours', polarity: 'lower-is-better' },
  { field: 'avgChangesRequested', label: '平均要求修改次數', unit: 'count', polarity: 'lower-is-better' },
  { field: 'avgApprovals', label: '平均核准數', unit: 'count', polarity: 'neutral' },
  { field: 'avgCommits', label: '平均 commit 數', unit: 'count', polarity: 'neutral' },
  { field: 'avgReviewers', label: '平均審查者', unit: 'count', polarity: 'neutral' },
  { field: 'avgHumanReviewers', label: '平均審查者（排除 bot）', unit: 'count', polarity: 'neutral' },
  { field: 'avgComments', label: '平均評論數', unit: 'count', polarity: 'neutral' },
  { field: 'avgHumanComments', label: '平均評論數（排除 bot）', unit: 'count', polarity: 'neutral' },
  { field: 'avgAdditions', label: '平均新增行數', unit: 'lines', polarity: 'neutral' },
  { field: 'avgDeletions', label: '平均刪除行數', unit: 'lines', polarity: 'neutral' },
  { field: 'avgFilesChanged', label: '平均變更檔案數', unit: 'count', polarity: 'neutral' },
]

/**
 * 建立 PR 指標定義
 */
export function pullRequestMetricDefinitions(
  phases: readonly PullRequestPhaseMetrics[]
): MetricDefinition<PullRequestPhaseMetrics>[] {
  const tools = union(phases.map((p) => p.tools.map((t) => t.tool)))

  const definitions: MetricDefinition<PullRequestPhaseMetrics>[] = [
    {
      key: 'totalPrs',
      label: '合併的 PR 數（排除 bot）',
      unit: 'count',
      polarity: 'neutral',
      extract: (m) => m.totalPrs,
    },
    {
      key: 'aiAdoptionRate',
      label: 'AI 採用率',
      unit: 'percent',
      polarity: 'higher-is-better',
      extract: (m) => m.aiAdoptionRate,
    },
    {
      key: 'aiAssistedPrs',
      label: 'AI 輔助 PR 數',
      unit: 'count',
      polarity: 'neutral',
      extract: (m) => m.aiAssistedPrs,
    },
  ]

  for (const tool of tools) {
    definitions.push({
      key: `tool.${tool}`,
      label: `${tool} PR 數`,
      unit: 'count',
      polarity: 'neutral',
      extract: (m) => m.tools.find((t) => t.tool === tool)?.prCount ?? 0,
    })
  }

  definitions.push({
    key: 'multiToolPrs',
    label: '多工具 PR 數',
    unit: 'count',
    polarity: 'neutral',
    extract: (m) => m.multiToolPrs,
  })

  for (const { field, label, unit, polarity } of PULL_REQUEST_AVERAGE_FIELDS) {
    definitions.push({ key: `overall.${field}`, label, unit, polarity, extract: (m) => m.overall[field] })
  }

  definitions.push(
    {
      key: 'ai.avgTimeToMergeDays',
      label: 'AI PR 平均合併時間',
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.ai.avgTimeToMergeDays,
    },
    {
      key: 'nonAi.avgTimeToMergeDays',
      label: '非 AI PR 平均合併時間',
      unit: 'days',
      polarity: 'lower-is-better',
      extract: (m) => m.nonAi.avgTimeToMergeDays,
    },
    {
      key: 'mergeTimeImprovement',
      label: 'AI 合併時間改善',
      unit: 'percent',
      polarity: 'higher-is-better',
      extract: (m) => m.mergeTimeImprovement,
    },
    {
      key: 'changesRequestedReduction',
      label: 'AI 要求修改次數減少',
      unit: 'percent',
      polarity: 'higher-is-better',
      extract: (m) => m.changesRequestedReduction,
    }
  )

  return definitions
}
