/**
 * Issue tracker 搜尋匯出轉接器
 *
 * 將 issue tracker 搜尋 API 的匯出（`{ issues: [...] }`，含 `expand=changelog`）
 * 轉為正規化的 issue 紀錄。只取 `field == "status"` 的變更項目，
 * 依匯出中的歷程順序攤平，不重新排序。
 *
 * @module services/issue-export-adapter
 */

import { z } from 'zod'
import type { IssueRecordInput } from '../types/records.js'

const NamedSchema = z.object({ name: z.string().nullish() }).nullish()

const AssigneeSchema = z.object({
  name: z.string().nullish(),
  emailAddress: z.string().nullish(),
  displayName: z.string().nullish(),
}).nullish()

/**
 * 只讀取自有屬性（`toString` 與 Object.prototype 同名）
 */
function ownProperty(value: object, key: string): unknown {
  return Object.hasOwn(value, key) ? Reflect.get(value, key) : undefined
}

const ChangeItemSchema = z.preprocess(
  (value) =>
    typeof value === 'object' && value !== null
      ? {
          field: ownProperty(value, 'field'),
          from: ownProperty(value, 'fromString'),
          to: ownProperty(value, 'toString'),
        }
      : value,
  z.object({
    field: z.string().nullish(),
    from: z.string().nullish(),
    to: z.string().nullish(),
  })
)

const HistorySchema = z.object({
  created: z.string().nullish(),
  items: z.array(ChangeItemSchema).default([]),
})

const ExportedIssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    created: z.string(),
    resolutiondate: z.string().nullish(),
    issuetype: NamedSchema,
    status: NamedSchema,
    assignee: AssigneeSchema,
  }),
  changelog: z.object({
    histories: z.array(HistorySchema).default([]),
  }).nullish(),
})

type ExportedIssue = z.infer<typeof ExportedIssueSchema>

/**
 * 匯出檔外層
 */
export const IssueExportSchema = z.object({
  issues: z.array(z.unknown()),
})

/**
 * 是否為搜尋匯出格式
 */
export function isIssueExport(json: unknown): json is z.infer<typeof IssueExportSchema> {
  return IssueExportSchema.safeParse(json).success
}

function toRecord(issue: ExportedIssue): IssueRecordInput {
  const { fields } = issue
  const transitions: NonNullable<IssueRecordInput['transitions']> = []

  for (const history of issue.changelog?.histories ?? []) {
    if (!history.created) continue
    for (const item of history.items) {
      if (item.field !== 'status' || !item.to) continue
      transitions.push({ from: item.from ?? null, to: item.to, at: history.created })
    }
  }

  return {
    id: issue.key,
    type: fields.issuetype?.name ?? null,
    status: fields.status?.name ?? null,
    assignee: fields.assignee?.name ?? fields.assignee?.emailAddress ?? fields.assignee?.displayName ?? null,
    createdAt: fields.created,
    resolvedAt: fields.resolutiondate ?? null,
    transitions,
  }
}

/**
 * 攤平匯出內容
 *
 * 無法辨識的項目原樣保留，交由紀錄正規化記錄為略過的紀錄。
 *
 * @example
 * ```typescript
 * const records = flattenIssueExport(JSON.parse(content))
 * const { items } = new RecordNormalizer().normalizeIssues(records)
 * ```
 */
export function flattenIssueExport(json: z.infer<typeof IssueExportSchema>): unknown[] {
  return json.issues.map((raw) => {
    const parsed = ExportedIssueSchema.safeParse(raw)
    return parsed.success ? toRecord(parsed.data) : raw
  })
}
