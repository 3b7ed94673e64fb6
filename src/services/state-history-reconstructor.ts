/**
 * 狀態歷程重建器
 *
 * 由項目的原始狀態轉換序列重建每個工作流程狀態的停留區間（進入時間、離開時間），
 * 並保留重複進入：同一狀態進入三次會得到三個區間。
 *
 * 處理規則：
 * - 依給定順序單次走訪，不重新排序
 * - 轉換到目前所在狀態視為重複事件，不開啟新區間
 * - 時間倒退產生的負值區間保留原值並記錄資料品質警告，不截為 0
 * - 最後一段以觀察終點關閉；沒有觀察終點時保持開放
 *
 * @module services/state-history-reconstructor
 */

import type { StateTransition } from '../models/work-item.js'
import type {
  DataQualityWarning,
  StateHistory,
  StateInterval,
  StateVisitSummary,
} from '../models/state-history.js'
import { durationDays, formatInstant } from '../utils/instant.js'
import { sum } from '../utils/statistics.js'

/**
 * 重建器設定
 */
export interface StateHistoryReconstructorOptions {
  /** 已知的工作流程狀態；提供時會對未知狀態發出警告 */
  knownStates?: readonly string[]
  /** 沒有任何轉換時使用的預設初始狀態 */
  defaultInitialState?: string
}

/**
 * 單一項目的重建輸入
 */
export interface ReconstructionInput {
  itemId: string
  transitions: readonly StateTransition[]
  /** 建立時間；用於補上第一次轉換之前的初始狀態 */
  createdAt?: Date
  /** 觀察終點（解決時間或呼叫端指定的「現在」） */
  observationEnd?: Date
  /** 覆寫預設初始狀態（例如項目目前的狀態） */
  defaultInitialState?: string
}

interface OpenState {
  state: string
  enteredAt: Date
}

/**
 * 狀態歷程重建器類別
 */
export class StateHistoryReconstructor {
  private readonly knownStates: ReadonlySet<string> | null
  private readonly defaultInitialState: string | undefined

  constructor(options: StateHistoryReconstructorOptions = {}) {
    this.knownStates = options.knownStates ? new Set(options.knownStates) : null
    this.defaultInitialState = options.defaultInitialState
  }

  /**
   * 重建單一項目的狀態歷程
   *
   * @example
   * ```typescript
   * const history = new StateHistoryReconstructor().reconstruct({
   *   itemId: 'PROJ-1',
   *   transitions: [
   *     { toState: 'New', at: parseInstant('2024-01-01') },
   *     { toState: 'In Progress', at: parseInstant('2024-01-02') },
   *   ],
   *   observationEnd: parseInstant('2024-01-05'),
   * })
   * history.intervalsByState['In Progress'][0].durationDays // 3
   * ```
   */
  reconstruct(input: ReconstructionInput): StateHistory {
    const { itemId, transitions, createdAt, observationEnd } = input
    const initialState = input.defaultInitialState ?? this.defaultInitialState
    const warnings: DataQualityWarning[] = []
    const reportedUnknown = new Set<string>()
    const intervals: StateInterval[] = []

    const checkKnown = (state: string, at?: Date): void => {
      if (!this.knownStates || this.knownStates.has(state) || reportedUnknown.has(state)) return
      reportedUnknown.add(state)
      warnings.push({
        kind: 'unknown-state',
        itemId,
        state,
        at,
        message: `${itemId}: 未知的工作流程狀態「${state}」`,
      })
    }

    const close = (open: OpenState, exitedAt: Date): StateInterval => {
      const days = durationDays(open.enteredAt, exitedAt)
      if (days < 0) {
        warnings.push({
          kind: 'negative-duration',
          itemId,
          state: open.state,
          at: exitedAt,
          message: `${itemId}: 狀態「${open.state}」的區間為負值（${days.toFixed(2)} 天）`,
        })
      }
      return { state: open.state, enteredAt: open.enteredAt, exitedAt, durationDays: days }
    }

    let current: OpenState | null = null
    const first = transitions[0]

    if (first === undefined) {
      if (initialState && createdAt) {
        checkKnown(initialState, createdAt)
        current = { state: initialState, enteredAt: createdAt }
      }
    } else if (first.fromState && createdAt) {
      if (createdAt.getTime() <= first.at.getTime()) {
        // 變更紀錄不包含建立時的狀態，以第一次轉換的原狀態補上
        checkKnown(first.fromState, createdAt)
        current = { state: first.fromState, enteredAt: createdAt }
      } else {
        warnings.push({
          kind: 'out-of-order-transition',
          itemId,
          state: first.toState,
          at: first.at,
          message: `${itemId}: 第一次轉換（${formatInstant(first.at)}）早於建立時間`,
        })
      }
    }

    let previousAt: Date | null = null

    for (const transition of transitions) {
      if (previousAt && transition.at.getTime() < previousAt.getTime()) {
        warnings.push({
          kind: 'out-of-order-transition',
          itemId,
          state: transition.toState,
          at: transition.at,
          message: `${itemId}: 轉換到「${transition.toState}」的時間（${formatInstant(transition.at)}）早於前一筆轉換`,
        })
      }
      previousAt = transition.at
      checkKnown(transition.toState, transition.at)

      if (current === null) {
        current = { state: transition.toState, enteredAt: transition.at }
        continue
      }

      if (transition.fromState !== undefined && transition.fromState !== current.state) {
        warnings.push({
          kind: 'from-state-mismatch',
          itemId,
          state: transition.fromState,
          at: transition.at,
          message: `${itemId}: 轉換的原狀態「${transition.fromState}」與目前狀態「${current.state}」不符`,
        })
      }

      // 重複事件
      if (transition.toState === current.state) continue

      intervals.push(close(current, transition.at))
      current = { state: transition.toState, enteredAt: transition.at }
    }

    if (current !== null) {
      intervals.push(
        observationEnd
          ? close(current, observationEnd)
          : { state: current.state, enteredAt: current.enteredAt, exitedAt: null, durationDays: null }
      )
    }

    return {
      itemId,
      intervals,
      ...groupByState(intervals),
      firstEnteredAt: intervals[0]?.enteredAt ?? null,
      warnings,
    }
  }
}

/**
 * 依狀態分組（依首次進入順序）
 */
function groupByState(
  intervals: readonly StateInterval[]
): Pick<StateHistory, 'intervalsByState' | 'states'> {
  const grouped = new Map<string, StateInterval[]>()

  for (const interval of intervals) {
    const list = grouped.get(interval.state)
    if (list) {
      list.push(interval)
    } else {
      grouped.set(interval.state, [interval])
    }
  }

  const states: StateVisitSummary[] = []
  for (const [state, list] of grouped) {
    states.push({
      state,
      entries: list.length,
      totalDays: sum(list.map((i) => i.durationDays).filter((d): d is number => d !== null)),
    })
  }

  return { intervalsByState: Object.fromEntries(grouped), states }
}
