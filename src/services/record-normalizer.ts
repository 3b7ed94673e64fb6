/**
 * 紀錄正規化服務
 *
 * 輸入邊界：將外部 JSON 紀錄驗證並轉換為 WorkItem。
 * 單筆紀錄的結構或時間錯誤只影響該筆（記錄為 RecordRejection 後略過），
 * 非空輸入全部失敗時才視為系統性錯誤。
 *
 * @module services/record-normalizer
 */

import { ZodError } from 'zod'
import type { IssueWorkItem, PullRequestWorkItem, StateTransition } from '../models/work-item.js'
import { AppError, ErrorType, InvalidTimestampError } from '../models/error.js'
import {
  IssueRecordSchema,
  PullRequestRecordSchema,
  type IssueRecord,
  type PullRequestRecord,
} from '../types/records.js'
import { AiAssistanceClassifier } from './ai-assistance-classifier.js'
import { parseInstant } from '../utils/instant.js'

/**
 * 被略過的紀錄
 */
export interface RecordRejection {
  /** 在輸入陣列中的位置 */
  index: number
  /** 紀錄 ID（能讀到時） */
  id?: string
  reason: string
  /** 出錯的欄位路徑 */
  field?: string
}

/**
 * 正規化結果
 */
export interface NormalizationResult<T> {
  items: T[]
  rejections: RecordRejection[]
}

/**
 * 嘗試從原始紀錄讀出 ID（僅用於錯誤訊息）
 */
function peekId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return undefined
  const id = raw.id
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined
}

/**
 * 逐筆轉換；失敗的紀錄轉為 RecordRejection
 *
 * @throws {AppError} 非空輸入中沒有任何一筆成功時（NO_VALID_RECORDS）
 */
function normalizeBatch<T>(
  records: readonly unknown[],
  kind: string,
  convert: (raw: unknown) => T
): NormalizationResult<T> {
  const items: T[] = []
  const rejections: RecordRejection[] = []

  records.forEach((raw, index) => {
    try {
      items.push(convert(raw))
    } catch (error) {
      if (error instanceof ZodError) {
        const issue = error.issues[0]
        rejections.push({
          index,
          id: peekId(raw),
          reason: issue ? issue.message : '紀錄結構錯誤',
          field: issue && issue.path.length > 0 ? issue.path.join('.') : undefined,
        })
        return
      }

      if (error instanceof InvalidTimestampError) {
        rejections.push({ index, id: peekId(raw), reason: error.message, field: error.field })
        return
      }

      throw error
    }
  })

  if (records.length > 0 && items.length === 0) {
    throw new AppError(
      ErrorType.NO_VALID_RECORDS,
      `${records.length} 筆 ${kind} 紀錄皆無法解析（第一筆原因：${rejections[0]?.reason ?? '未知'}）`
    )
  }

  return { items, rejections }
}

/**
 * 紀錄正規化服務類別
 */
export class RecordNormalizer {
  constructor(private readonly classifier: AiAssistanceClassifier = new AiAssistanceClassifier()) {}

  /**
   * 正規化 issue 紀錄
   *
   * @example
   * ```typescript
   * const { items, rejections } = new RecordNormalizer().normalizeIssues(json)
   * ```
   */
  normalizeIssues(records: readonly unknown[]): NormalizationResult<IssueWorkItem> {
    return normalizeBatch(records, 'issue', (raw) => this.toIssue(IssueRecordSchema.parse(raw)))
  }

  /**
   * 正規化 PR 紀錄
   */
  normalizePullRequests(records: readonly unknown[]): NormalizationResult<PullRequestWorkItem> {
    return normalizeBatch(records, 'PR', (raw) =>
      this.toPullRequest(PullRequestRecordSchema.parse(raw))
    )
  }

  private toIssue(record: IssueRecord): IssueWorkItem {
    const transitions: StateTransition[] = record.transitions.map((t, i) => ({
      fromState: t.from ?? undefined,
      toState: t.to,
      at: parseInstant(t.at, `transitions.${i}.at`),
    }))

    return {
      kind: 'issue',
      id: record.id,
      type: record.type ?? null,
      currentState: record.status ?? null,
      actor: record.assignee ?? null,
      createdAt: parseInstant(record.createdAt, 'createdAt'),
      resolvedAt: record.resolvedAt ? parseInstant(record.resolvedAt, 'resolvedAt') : null,
      transitions,
      aiTools: this.classifier.classify(record.commitMessages).tools,
    }
  }

  private toPullRequest(record: PullRequestRecord): PullRequestWorkItem {
    const classification = this.classifier.classify(record.commitMessages)

    return {
      kind: 'pull-request',
      id: record.id,
      title: record.title,
      actor: record.author ?? null,
      createdAt: parseInstant(record.createdAt, 'createdAt'),
      resolvedAt: record.mergedAt ? parseInstant(record.mergedAt, 'mergedAt') : null,
      commitMessages: record.commitMessages,
      aiTools: classification.tools,
      aiCommitCount: classification.aiCommitCount,
      reviews: record.reviews.map((review, i) => ({
        reviewer: review.reviewer,
        state: review.state,
        submittedAt: review.submittedAt
          ? parseInstant(review.submittedAt, `reviews.${i}.submittedAt`)
          : null,
        body: review.body ?? '',
      })),
      comments: record.comments.map((comment) => ({
        author: comment.author,
        body: comment.body ?? '',
      })),
      additions: record.additions,
      deletions: record.deletions,
      changedFiles: record.changedFiles,
    }
  }
}
