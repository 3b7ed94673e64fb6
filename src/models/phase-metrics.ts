/**
 * 階段指標資料模型
 *
 * 所有「不存在」的指標以 null 表示，與數值 0 意義不同。
 */

import type { DataQualityWarning } from './state-history.js'

/**
 * 由實際解決時間推導的日期範圍（非查詢區間）
 */
export interface DerivedDateRange {
  /** 最早解決時間 */
  start: Date
  /** 最晚解決時間 */
  end: Date
  /** 跨度（天，含小數） */
  days: number
}

/**
 * 配置中的查詢區間
 */
export interface QueryWindow {
  start: Date
  end: Date
}

/**
 * 結案時間統計（天）
 */
export interface ClosureTimeStatistics {
  /** 有解決時間的項目數 */
  resolvedCount: number
  averageDays: number | null
  averageHours: number | null
  minDays: number | null
  maxDays: number | null
}

/**
 * 單一狀態的階段統計
 */
export interface StateMetric {
  state: string
  /** 曾進入此狀態的項目數 */
  itemsEntered: number
  /** 總進入次數 */
  totalEntries: number
  /** 停留天數總和 */
  totalDays: number
  /** 平均停留天數（除以進入過的項目數） */
  averageDays: number | null
  /** 重複進入率（1.0 代表沒有項目重複進入） */
  reentryRate: number | null
  /** 重複進入率超過警告閾值 */
  bouncing: boolean
}

/**
 * 類型分佈項目
 */
export interface TypeShare {
  type: string
  count: number
  percentage: number
}

/**
 * 單一項目的診斷資訊
 */
export interface ItemDiagnostics {
  itemId: string
  warnings: DataQualityWarning[]
}

/**
 * 世代（cohort）共同欄位
 */
export interface CohortMetricsBase {
  /** 階段名稱 */
  label: string
  /** 限定的負責人（整個團隊則為 null） */
  actor: string | null
  /** 查詢區間（僅供顯示，不用於計算） */
  queryWindow: QueryWindow | null
  /** 推導的日期範圍；沒有任何已解決項目時為 null */
  dateRange: DerivedDateRange | null
}

/**
 * Issue 階段指標
 */
export interface IssuePhaseMetrics extends CohortMetricsBase {
  kind: 'issue'
  itemCount: number
  closure: ClosureTimeStatistics
  /** 每日吞吐量（項目數 / 推導範圍天數） */
  throughputPerDay: number | null
  /** 最早建立到最晚解決的天數 */
  dataSpanDays: number | null
  /** 各狀態統計（追蹤中的狀態在前，其餘依首次出現順序） */
  states: StateMetric[]
  typeDistribution: TypeShare[]
  diagnostics: ItemDiagnostics[]
}

/**
 * 單一 PR 的指標
 */
export interface PullRequestItemMetrics {
  id: string
  timeToMergeDays: number | null
  timeToMergeHours: number | null
  /** 建立到第一次審查（沒有審查時為 null） */
  timeToFirstReviewHours: number | null
  changesRequested: number
  approvals: number
  commits: number
  reviewers: number
  humanReviewers: number
  /** 評論與有內容的審查（不含核准） */
  comments: number
  /** 排除 bot 與對 bot 下指令的評論 */
  humanComments: number
  additions: number
  deletions: number
  changedFiles: number
  aiTools: readonly string[]
  aiCommitCount: number
}

/**
 * PR 平均指標
 */
export interface PullRequestAverages {
  count: number
  avgTimeToMergeDays: number | null
  avgTimeToFirstReviewHours: number | null
  avgChangesRequested: number | null
  avgApprovals: number | null
  avgCommits: number | null
  avgReviewers: number | null
  avgHumanReviewers: number | null
  avgComments: number | null
  avgHumanComments: number | null
  avgAdditions: number | null
  avgDeletions: number | null
  avgFilesChanged: number | null
}

/**
 * AI 工具使用計數
 */
export interface ToolUsage {
  tool: string
  prCount: number
}

/**
 * PR 階段指標
 */
export interface PullRequestPhaseMetrics extends CohortMetricsBase {
  kind: 'pull-request'
  totalPrs: number
  aiAssistedPrs: number
  nonAiPrs: number
  /** AI 採用率（%）；沒有 PR 時為 null */
  aiAdoptionRate: number | null
  tools: ToolUsage[]
  multiToolPrs: number
  overall: PullRequestAverages
  ai: PullRequestAverages
  nonAi: PullRequestAverages
  /** AI PR 相較非 AI PR 的合併時間改善（%） */
  mergeTimeImprovement: number | null
  /** AI PR 相較非 AI PR 的要求修改次數減少（%） */
  changesRequestedReduction: number | null
  diagnostics: ItemDiagnostics[]
}

export type PhaseMetrics = IssuePhaseMetrics | PullRequestPhaseMetrics
