/**
 * 狀態歷程資料模型
 */

/**
 * 狀態區間（衍生資料，不儲存）
 */
export interface StateInterval {
  state: string
  enteredAt: Date
  /** 離開時間；僅最後一段尚未離開且沒有觀察終點時為 null */
  exitedAt: Date | null
  /** 停留天數；開放區間為 null，資料順序錯亂時可能為負值 */
  durationDays: number | null
}

/**
 * 資料品質警告類型
 */
export type DataQualityWarningKind =
  | 'out-of-order-transition'
  | 'negative-duration'
  | 'unknown-state'
  | 'from-state-mismatch'
  | 'negative-closure-time'

/**
 * 資料品質警告（不中斷批次處理）
 */
export interface DataQualityWarning {
  kind: DataQualityWarningKind
  itemId: string
  message: string
  /** 相關狀態 */
  state?: string
  /** 相關時間點 */
  at?: Date
}

/**
 * 單一狀態的彙總
 */
export interface StateVisitSummary {
  state: string
  /** 進入次數 */
  entries: number
  /** 已關閉區間的停留天數總和 */
  totalDays: number
}

/**
 * 單一項目的狀態歷程重建結果
 */
export interface StateHistory {
  itemId: string
  /** 依時間順序的所有區間 */
  intervals: StateInterval[]
  /** 狀態 → 依序的區間（保留重複進入） */
  intervalsByState: Record<string, StateInterval[]>
  /** 依首次進入順序的彙總 */
  states: StateVisitSummary[]
  /** 第一次進入工作流程的時間 */
  firstEnteredAt: Date | null
  warnings: DataQualityWarning[]
}
