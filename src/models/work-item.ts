/**
 * 工作項目資料模型
 *
 * 分析的基本單位：issue 或 pull request。
 * 建構後不再修改，分析過程只讀取快照。
 */

/** 無法辨識類型時使用的分佈項目 */
export const UNKNOWN_TYPE = 'Unknown'

/**
 * 單次工作流程狀態變更
 */
export interface StateTransition {
  /** 原狀態（進入工作流程的第一次轉換可能沒有） */
  fromState?: string
  /** 新狀態 */
  toState: string
  /** 變更時間 */
  at: Date
}

/**
 * 工作項目共同欄位
 */
export interface WorkItemBase {
  /** 外部穩定識別碼 */
  id: string
  /** 建立時間 */
  createdAt: Date
  /** 解決／合併時間（尚未完成則為 null） */
  resolvedAt: Date | null
  /** 負責人或作者 */
  actor: string | null
  /** 偵測到的 AI 工具（空陣列代表非 AI 輔助） */
  aiTools: readonly string[]
}

/**
 * Issue 工作項目
 */
export interface IssueWorkItem extends WorkItemBase {
  kind: 'issue'
  /** 類型標籤（未知則為 null） */
  type: string | null
  /** 目前狀態（用於沒有任何轉換紀錄的項目） */
  currentState: string | null
  /** 依時間排序的狀態轉換 */
  transitions: readonly StateTransition[]
}

/**
 * PR 審查狀態
 */
export type ReviewState = 'APPROVED' | 'CHANGES_REQUESTED' | 'COMMENTED' | 'DISMISSED' | 'PENDING'

/**
 * PR 審查紀錄
 */
export interface ReviewRecord {
  reviewer: string
  state: ReviewState
  submittedAt: Date | null
  body: string
}

/**
 * PR 評論紀錄
 */
export interface CommentRecord {
  author: string
  body: string
}

/**
 * Pull Request 工作項目（PR 沒有類型標籤）
 */
export interface PullRequestWorkItem extends WorkItemBase {
  kind: 'pull-request'
  title: string
  commitMessages: readonly string[]
  /** 含 AI 標記的 commit 數 */
  aiCommitCount: number
  reviews: readonly ReviewRecord[]
  comments: readonly CommentRecord[]
  additions: number
  deletions: number
  changedFiles: number
}

export type WorkItem = IssueWorkItem | PullRequestWorkItem
