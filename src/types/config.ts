/**
 * 配置檔案 Schema
 *
 * 使用 Zod 定義 `.phase-velocity.yml` 的驗證規則與預設值。
 *
 * @module types/config
 */

import { z } from 'zod'
import {
  DEFAULT_AI_TOOLS,
  DEFAULT_AI_TRAILER_KEYS,
  DEFAULT_REENTRY_WARNING_THRESHOLD,
  DEFAULT_TRACKED_STATES,
} from '../constants/analysis-defaults.js'
import { isCalendarDate } from '../utils/instant.js'

/**
 * 查詢區間日期（YYYY-MM-DD）
 */
const CalendarDateSchema = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, '日期格式須為 YYYY-MM-DD')
  .refine(isCalendarDate, { message: '日期不存在' })

/**
 * 階段定義
 */
export const PhaseConfigSchema = z.object({
  name: z.string()
    .min(1)
    .describe('階段名稱（如「導入前」、「Cursor 導入後」）'),

  start: CalendarDateSchema
    .describe('查詢區間開始日期'),

  end: CalendarDateSchema
    .describe('查詢區間結束日期'),

  issues: z.string()
    .min(1)
    .optional()
    .describe('issue 紀錄檔（相對於配置檔目錄）'),

  pullRequests: z.string()
    .min(1)
    .optional()
    .describe('PR 紀錄檔（相對於配置檔目錄）')
}).refine(
  (phase) => phase.start <= phase.end,
  { message: '階段開始日期不可晚於結束日期', path: ['end'] }
)

export type PhaseConfig = z.infer<typeof PhaseConfigSchema>

/**
 * 工作流程設定
 */
export const WorkflowConfigSchema = z.object({
  states: z.array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_TRACKED_STATES])
    .describe('追蹤的工作流程狀態（即使沒有項目進入也會列出）'),

  initialState: z.string()
    .min(1)
    .optional()
    .describe('沒有任何轉換紀錄時的初始狀態'),

  knownStates: z.array(z.string().min(1))
    .optional()
    .describe('已知狀態；轉換到其他狀態時發出資料品質警告'),

  reentryWarningThreshold: z.number()
    .positive()
    .default(DEFAULT_REENTRY_WARNING_THRESHOLD)
    .describe('重複進入率警告閾值')
})

/**
 * AI 輔助辨識設定
 */
export const AiConfigSchema = z.object({
  tools: z.array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_AI_TOOLS])
    .describe('辨識的 AI 工具名稱'),

  trailers: z.array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_AI_TRAILER_KEYS])
    .describe('辨識的 commit trailer 鍵')
})

/**
 * 完整配置
 */
export const PhaseVelocityConfigSchema = z.object({
  phases: z.array(PhaseConfigSchema)
    .min(1)
    .refine(
      (phases) => new Set(phases.map((p) => p.name)).size === phases.length,
      { message: '階段名稱不可重複' }
    )
    .describe('依比較順序排列的階段'),

  workflow: WorkflowConfigSchema.default({}),

  ai: AiConfigSchema.default({}),

  bots: z.object({
    authors: z.array(z.string().min(1)).default([])
      .describe('額外排除的自動化帳號')
  }).default({}),

  actors: z.object({
    stripPrefixes: z.array(z.string().min(1)).default([])
      .describe('正規化負責人名稱時移除的前綴')
  }).default({})
})

export type PhaseVelocityConfig = z.infer<typeof PhaseVelocityConfigSchema>

/**
 * 配置驗證錯誤
 */
export interface ConfigValidationIssue {
  path: string
  message: string
  code: string
}

/**
 * 配置驗證結果
 */
export type ConfigValidationResult =
  | { valid: true; config: PhaseVelocityConfig; errors: [] }
  | { valid: false; errors: ConfigValidationIssue[] }

/**
 * 不含階段的分析設定（`issues`、`prs` 指令在沒有配置檔時使用預設值）
 */
export const AnalysisSettingsSchema = PhaseVelocityConfigSchema.omit({ phases: true })

export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>

/**
 * 取得預設分析設定
 */
export function defaultAnalysisSettings(): AnalysisSettings {
  return AnalysisSettingsSchema.parse({})
}
