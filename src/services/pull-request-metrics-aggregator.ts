/**
 * PR 指標聚合器
 *
 * 計算單一 PR 的審查與規模指標，並聚合為世代層級的 AI 採用率，
 * 以及整體、AI 輔助、非 AI 三組平均值。
 *
 * @module services/pull-request-metrics-aggregator
 */

import type { PullRequestWorkItem } from '../models/work-item.js'
import type {
  ItemDiagnostics,
  PullRequestAverages,
  PullRequestItemMetrics,
  PullRequestPhaseMetrics,
  ToolUsage,
} from '../models/phase-metrics.js'
import { BotAuthorFilter } from './bot-author-filter.js'
import { deriveDateRange, type CohortContext } from './issue-metrics-aggregator.js'
import { durationDays, durationHours } from '../utils/instant.js'
import { mean, percentageChange, present, ratio } from '../utils/statistics.js'

/**
 * 計算「AI 比非 AI 少多少」（%）
 *
 * @returns 任一側不存在或非 AI 基準不為正數時返回 null
 */
function reduction(ai: number | null, nonAi: number | null): number | null {
  if (ai === null || nonAi === null || nonAi <= 0) return null
  const change = percentageChange(nonAi, ai)
  return change === null ? null : -change
}

/**
 * PR 指標聚合器類別
 */
export class PullRequestMetricsAggregator {
  constructor(private readonly botFilter: BotAuthorFilter = new BotAuthorFilter()) {}

  /**
   * 計算單一 PR 的指標
   */
  measure(pr: PullRequestWorkItem): PullRequestItemMetrics {
    const timeToMergeDays = pr.resolvedAt ? durationDays(pr.createdAt, pr.resolvedAt) : null

    let firstReviewAt: Date | null = null
    for (const review of pr.reviews) {
      if (review.submittedAt && (!firstReviewAt || review.submittedAt.getTime() < firstReviewAt.getTime())) {
        firstReviewAt = review.submittedAt
      }
    }

    const reviewers = new Set(pr.reviews.map((r) => r.reviewer))
    const humanReviewers = [...reviewers].filter((name) => !this.botFilter.isBot(name))

    // 有內容的審查意見視同評論；核准附帶的留言不計
    const reviewBodies = pr.reviews
      .filter((r) => r.state !== 'APPROVED' && r.body.trim() !== '')
      .map((r) => ({ author: r.reviewer, body: r.body }))
    const allComments = [...pr.comments, ...reviewBodies]

    return {
      id: pr.id,
      timeToMergeDays,
      timeToMergeHours: timeToMergeDays === null ? null : timeToMergeDays * 24,
      timeToFirstReviewHours: firstReviewAt ? durationHours(pr.createdAt, firstReviewAt) : null,
      changesRequested: pr.reviews.filter((r) => r.state === 'CHANGES_REQUESTED').length,
      approvals: pr.reviews.filter((r) => r.state === 'APPROVED').length,
      commits: pr.commitMessages.length,
      reviewers: reviewers.size,
      humanReviewers: humanReviewers.length,
      comments: allComments.length,
      humanComments: allComments.filter((c) => this.botFilter.isHumanComment(c)).length,
      additions: pr.additions,
      deletions: pr.deletions,
      changedFiles: pr.changedFiles,
      aiTools: pr.aiTools,
      aiCommitCount: pr.aiCommitCount,
    }
  }

  /**
   * 計算平均值（空輸入時全部為 null）
   */
  averages(metrics: readonly PullRequestItemMetrics[]): PullRequestAverages {
    const avg = (pick: (m: PullRequestItemMetrics) => number | null): number | null =>
      mean(present(metrics.map(pick)))

    return {
      count: metrics.length,
      avgTimeToMergeDays: avg((m) => m.timeToMergeDays),
      avgTimeToFirstReviewHours: avg((m) => m.timeToFirstReviewHours),
      avgChangesRequested: avg((m) => m.changesRequested),
      avgApprovals: avg((m) => m.approvals),
      avgCommits: avg((m) => m.commits),
      avgReviewers: avg((m) => m.reviewers),
      avgHumanReviewers: avg((m) => m.humanReviewers),
      avgComments: avg((m) => m.comments),
      avgHumanComments: avg((m) => m.humanComments),
      avgAdditions: avg((m) => m.additions),
      avgDeletions: avg((m) => m.deletions),
      avgFilesChanged: avg((m) => m.changedFiles),
    }
  }

  /**
   * 聚合單一世代
   *
   * bot 帳號開的 PR 應在呼叫前以 {@link BotAuthorFilter.partition} 排除。
   */
  aggregate(prs: readonly PullRequestWorkItem[], context: CohortContext = {}): PullRequestPhaseMetrics {
    const metrics = prs.map((pr) => this.measure(pr))
    const aiMetrics = metrics.filter((m) => m.aiTools.length > 0)
    const nonAiMetrics = metrics.filter((m) => m.aiTools.length === 0)

    const overall = this.averages(metrics)
    const ai = this.averages(aiMetrics)
    const nonAi = this.averages(nonAiMetrics)
    const adoption = ratio(aiMetrics.length, metrics.length)

    return {
      kind: 'pull-request',
      label: context.label ?? '',
      actor: context.actor ?? null,
      queryWindow: context.queryWindow ?? null,
      dateRange: deriveDateRange(prs),
      totalPrs: metrics.length,
      aiAssistedPrs: aiMetrics.length,
      nonAiPrs: nonAiMetrics.length,
      aiAdoptionRate: adoption === null ? null : adoption * 100,
      tools: this.toolUsage(metrics),
      multiToolPrs: aiMetrics.filter((m) => m.aiTools.length > 1).length,
      overall,
      ai,
      nonAi,
      mergeTimeImprovement: reduction(ai.avgTimeToMergeDays, nonAi.avgTimeToMergeDays),
      changesRequestedReduction: reduction(ai.avgChangesRequested, nonAi.avgChangesRequested),
      diagnostics: this.diagnostics(metrics),
    }
  }

  /**
   * 各工具的 PR 數（依工具名稱排序）
   */
  private toolUsage(metrics: readonly PullRequestItemMetrics[]): ToolUsage[] {
    const counts = new Map<string, number>()
    for (const m of metrics) {
      for (const tool of m.aiTools) {
        counts.set(tool, (counts.get(tool) ?? 0) + 1)
      }
    }

    return [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([tool, prCount]) => ({ tool, prCount }))
  }

  private diagnostics(metrics: readonly PullRequestItemMetrics[]): ItemDiagnostics[] {
    return metrics
      .filter((m) => m.timeToMergeDays !== null && m.timeToMergeDays < 0)
      .map((m) => ({
        itemId: m.id,
        warnings: [
          {
            kind: 'negative-closure-time' as const,
            itemId: m.id,
            message: `${m.id}: 合併時間早於建立時間（${(m.timeToMergeDays ?? 0).toFixed(2)} 天）`,
          },
        ],
      }))
  }
}
