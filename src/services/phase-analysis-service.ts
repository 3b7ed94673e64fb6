/**
 * 階段分析服務
 *
 * 串接整個流程：紀錄檔 → 正規化 → 世代過濾 → 聚合 → 跨階段比較。
 * 每次呼叫只讀取自己的輸入並產生新的結果，不保留跨呼叫的狀態。
 *
 * @module services/phase-analysis-service
 */

import * as path from 'node:path'
import type { IssuePhaseMetrics, PullRequestPhaseMetrics, QueryWindow } from '../models/phase-metrics.js'
import type { CohortComparison } from '../models/comparison.js'
import type { PullRequestWorkItem } from '../models/work-item.js'
import type { AnalysisSettings, PhaseConfig } from '../types/config.js'
import { defaultAnalysisSettings } from '../types/config.js'
import { AppError, ErrorType } from '../models/error.js'
import { AiAssistanceClassifier } from './ai-assistance-classifier.js'
import { BotAuthorFilter } from './bot-author-filter.js'
import { CohortComparator } from './cohort-comparator.js'
import { filterByActor } from './cohort-filter.js'
import { IssueMetricsAggregator } from './issue-metrics-aggregator.js'
import { issueMetricDefinitions, pullRequestMetricDefinitions } from './metric-definitions.js'
import { PullRequestMetricsAggregator } from './pull-request-metrics-aggregator.js'
import { readRecordFile } from './record-file-reader.js'
import { RecordNormalizer, type RecordRejection } from './record-normalizer.js'
import { parseCalendarDate } from '../utils/instant.js'

/**
 * 單一階段的 issue 分析結果
 */
export interface IssueAnalysis {
  metrics: IssuePhaseMetrics
  rejections: RecordRejection[]
}

/**
 * 單一階段的 PR 分析結果
 */
export interface PullRequestAnalysis {
  metrics: PullRequestPhaseMetrics
  rejections: RecordRejection[]
  /** 因 bot 作者而排除的 PR */
  excludedBotPrs: PullRequestWorkItem[]
}

/**
 * Issue 分析選項
 */
export interface IssueAnalysisOptions {
  label?: string
  actor?: string | null
  queryWindow?: QueryWindow | null
  /** 未解決項目的觀察終點 */
  asOf?: Date
}

/**
 * PR 分析選項
 */
export interface PullRequestAnalysisOptions {
  label?: string
  actor?: string | null
  queryWindow?: QueryWindow | null
  /** 保留 bot 帳號開的 PR */
  includeBots?: boolean
}

/**
 * 跨階段比較結果
 */
export interface PhaseComparisonResult<M> {
  comparison: CohortComparison
  phases: M[]
  rejections: Array<{ phase: string; rejections: RecordRejection[] }>
}

/**
 * 取得配置中階段的查詢區間
 */
export function queryWindowOf(phase: PhaseConfig): QueryWindow {
  return {
    start: parseCalendarDate(phase.start, `${phase.name}.start`),
    end: parseCalendarDate(phase.end, `${phase.name}.end`),
  }
}

/**
 * 階段分析服務類別
 */
export class PhaseAnalysisService {
  private readonly normalizer: RecordNormalizer
  private readonly botFilter: BotAuthorFilter
  private readonly issueAggregator: IssueMetricsAggregator
  private readonly prAggregator: PullRequestMetricsAggregator

  constructor(
    private readonly settings: AnalysisSettings = defaultAnalysisSettings(),
    private readonly baseDir: string = process.cwd()
  ) {
    this.normalizer = new RecordNormalizer(
      new AiAssistanceClassifier({ tools: settings.ai.tools, trailerKeys: settings.ai.trailers })
    )
    this.botFilter = new BotAuthorFilter(settings.bots.authors)
    this.issueAggregator = new IssueMetricsAggregator({
      trackedStates: settings.workflow.states,
      defaultInitialState: settings.workflow.initialState,
      knownStates: settings.workflow.knownStates,
      reentryWarningThreshold: settings.workflow.reentryWarningThreshold,
    })
    this.prAggregator = new PullRequestMetricsAggregator(this.botFilter)
  }

  /**
   * 分析單一世代的 issue 紀錄
   *
   * @throws {AppError} 非空輸入全部無法解析時（NO_VALID_RECORDS）
   */
  analyzeIssues(records: readonly unknown[], options: IssueAnalysisOptions = {}): IssueAnalysis {
    const { items, rejections } = this.normalizer.normalizeIssues(records)
    const cohort = filterByActor(items, options.actor, this.settings.actors.stripPrefixes)

    return {
      metrics: this.issueAggregator.aggregate(cohort, {
        label: options.label,
        actor: options.actor ?? null,
        queryWindow: options.queryWindow,
        asOf: options.asOf,
      }),
      rejections,
    }
  }

  /**
   * 分析單一世代的 PR 紀錄
   *
   * @throws {AppError} 非空輸入全部無法解析時（NO_VALID_RECORDS）
   */
  analyzePullRequests(
    records: readonly unknown[],
    options: PullRequestAnalysisOptions = {}
  ): PullRequestAnalysis {
    const { items, rejections } = this.normalizer.normalizePullRequests(records)
    const { kept, excluded } = options.includeBots
      ? { kept: items, excluded: [] }
      : this.botFilter.partition(items)
    const cohort = filterByActor(kept, options.actor, this.settings.actors.stripPrefixes)

    return {
      metrics: this.prAggregator.aggregate(cohort, {
        label: options.label,
        actor: options.actor ?? null,
        queryWindow: options.queryWindow,
      }),
      rejections,
      excludedBotPrs: excluded,
    }
  }

  /**
   * 依配置的階段順序比較 issue 指標
   *
   * @throws {AppError} 階段未指定 issue 紀錄檔時（INVALID_CONFIG）
   */
  compareIssues(
    phases: readonly PhaseConfig[],
    options: { actor?: string | null; asOf?: Date } = {}
  ): PhaseComparisonResult<IssuePhaseMetrics> {
    const analyses = phases.map((phase) => ({
      phase: phase.name,
      ...this.analyzeIssues(readRecordFile(this.resolveFile(phase, 'issues')), {
        label: phase.name,
        actor: options.actor,
        queryWindow: queryWindowOf(phase),
        asOf: options.asOf,
      }),
    }))

    const metrics = analyses.map((a) => a.metrics)
    const comparator = new CohortComparator(issueMetricDefinitions(metrics))

    return {
      comparison: comparator.compare(metrics, { actor: options.actor ?? null }),
      phases: metrics,
      rejections: analyses.map((a) => ({ phase: a.phase, rejections: a.rejections })),
    }
  }

  /**
   * 依配置的階段順序比較 PR 指標
   *
   * @throws {AppError} 階段未指定 PR 紀錄檔時（INVALID_CONFIG）
   */
  comparePullRequests(
    phases: readonly PhaseConfig[],
    options: { actor?: string | null } = {}
  ): PhaseComparisonResult<PullRequestPhaseMetrics> {
    const analyses = phases.map((phase) => ({
      phase: phase.name,
      ...this.analyzePullRequests(readRecordFile(this.resolveFile(phase, 'pullRequests')), {
        label: phase.name,
        actor: options.actor,
        queryWindow: queryWindowOf(phase),
      }),
    }))

    const metrics = analyses.map((a) => a.metrics)
    const comparator = new CohortComparator(pullRequestMetricDefinitions(metrics))

    return {
      comparison: comparator.compare(metrics, { actor: options.actor ?? null }),
      phases: metrics,
      rejections: analyses.map((a) => ({ phase: a.phase, rejections: a.rejections })),
    }
  }

  private resolveFile(phase: PhaseConfig, kind: 'issues' | 'pullRequests'): string {
    const file = phase[kind]
    if (!file) {
      throw new AppError(
        ErrorType.INVALID_CONFIG,
        `階段「${phase.name}」未指定 ${kind} 紀錄檔`
      )
    }
    return path.resolve(this.baseDir, file)
  }
}
