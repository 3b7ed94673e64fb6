/**
 * 分析預設值
 *
 * 配置檔案未指定時使用的工作流程狀態、AI 工具與 bot 帳號。
 */

/** 預設配置檔名（位於工作目錄） */
export const DEFAULT_CONFIG_FILE = '.phase-velocity.yml'

/** 預設追蹤的工作流程狀態（依工作流程順序） */
export const DEFAULT_TRACKED_STATES = [
  'New',
  'To Do',
  'In Progress',
  'Review',
  'Release Pending',
  'Waiting',
] as const

/** 重複進入率超過此值時標記為反覆進出 */
export const DEFAULT_REENTRY_WARNING_THRESHOLD = 1.5

/** 預設辨識的 AI 工具 */
export const DEFAULT_AI_TOOLS = ['Claude', 'Cursor'] as const

/** 預設辨識的 commit trailer 鍵（不區分大小寫） */
export const DEFAULT_AI_TRAILER_KEYS = ['Assisted-by', 'Co-authored-by', 'Generated-by'] as const

/**
 * 預設 bot 帳號（不區分大小寫）
 *
 * 以 `[bot]` 結尾的帳號一律視為 bot，不需列出。
 */
export const DEFAULT_BOT_AUTHORS = [
  'coderabbit',
  'coderabbitai',
  'dependabot',
  'renovate',
  'github-actions',
  'red-hat-konflux',
] as const

/** 只與 bot 對話的評論標記 */
export const DEFAULT_BOT_MENTIONS = ['@coderabbit'] as const

/** 重點變化預設列出的數量 */
export const DEFAULT_KEY_CHANGE_COUNT = 5
