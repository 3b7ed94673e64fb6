/**
 * 輸入紀錄 Schema
 *
 * 由外部擷取工具產生、已正規化的 issue 與 PR 紀錄。
 * 時間欄位保留原始字串，交由時間正規化逐欄解析。
 *
 * @module types/records
 */

import { z } from 'zod'

/** 數字或字串 ID 一律轉為字串 */
const IdSchema = z.union([z.string().min(1), z.number()]).transform(String)

/** 可為空的時間欄位 */
const OptionalTimestampSchema = z.string().nullish()

/**
 * 狀態轉換紀錄
 */
export const TransitionRecordSchema = z.object({
  from: z.string().nullish(),
  to: z.string().min(1),
  at: z.string()
})

export type TransitionRecord = z.infer<typeof TransitionRecordSchema>

/**
 * Issue 紀錄
 */
export const IssueRecordSchema = z.object({
  id: IdSchema,
  type: z.string().nullish(),
  status: z.string().nullish(),
  assignee: z.string().nullish(),
  createdAt: z.string(),
  resolvedAt: OptionalTimestampSchema,
  transitions: z.array(TransitionRecordSchema).default([]),
  commitMessages: z.array(z.string()).default([])
})

export type IssueRecord = z.infer<typeof IssueRecordSchema>
export type IssueRecordInput = z.input<typeof IssueRecordSchema>

/**
 * PR 審查紀錄
 */
export const ReviewRecordSchema = z.object({
  reviewer: z.string().min(1),
  state: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(['APPROVED', 'CHANGES_REQUESTED', 'COMMENTED', 'DISMISSED', 'PENDING'])
  ),
  submittedAt: OptionalTimestampSchema,
  body: z.string().nullish()
})

/**
 * PR 評論紀錄
 */
export const CommentRecordSchema = z.object({
  author: z.string().min(1),
  body: z.string().nullish()
})

/**
 * Pull Request 紀錄
 */
export const PullRequestRecordSchema = z.object({
  id: IdSchema,
  title: z.string().default(''),
  author: z.string().nullish(),
  createdAt: z.string(),
  mergedAt: OptionalTimestampSchema,
  commitMessages: z.array(z.string()).default([]),
  reviews: z.array(ReviewRecordSchema).default([]),
  comments: z.array(CommentRecordSchema).default([]),
  additions: z.number().int().min(0).default(0),
  deletions: z.number().int().min(0).default(0),
  changedFiles: z.number().int().min(0).default(0)
})

export type PullRequestRecord = z.infer<typeof PullRequestRecordSchema>
export type PullRequestRecordInput = z.input<typeof PullRequestRecordSchema>

/**
 * 紀錄檔外層：陣列或 `{ items: [...] }`
 */
export const RecordFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()) }).transform((file) => file.items)
])
