/**
 * 時間正規化工具
 *
 * 將 API 時間戳與使用者輸入的日期字串轉為同一參考時區（UTC）的時間點，
 * 並計算次日精度的經過時間。
 *
 * @module utils/instant
 */

import { isValid, parseISO } from 'date-fns'
import { InvalidTimestampError } from '../models/error.js'

/**
 * 可比較的時間點（一律以 UTC 解讀）
 */
export type Instant = Date

const MILLISECONDS_PER_HOUR = 60 * 60 * 1000
const MILLISECONDS_PER_DAY = 24 * MILLISECONDS_PER_HOUR

/** YYYY-MM-DD */
const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/**
 * ISO 8601 日期時間，時區可為 Z、±hh:mm、±hhmm 或 ±hh，也可省略
 *
 * 例：2024-01-15T10:30:00.000+0000（issue tracker）、2024-01-15T10:30:00Z（code host）
 */
const DATE_TIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:[.,]\d{1,9})?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i

/**
 * 解析時間點
 *
 * - 含時區的日期時間：依其時區換算
 * - 不含時區的日期時間：視為 UTC
 * - 純日期（YYYY-MM-DD）：UTC 當天 00:00:00
 *
 * @param raw - 原始值（字串或 Date）
 * @param field - 欄位名稱（附加於錯誤訊息）
 * @returns UTC 時間點
 * @throws {InvalidTimestampError} 無法以任何支援格式解析時
 *
 * @example
 * ```typescript
 * parseInstant('2024-01-15T10:30:00.000+0800') // 2024-01-15T02:30:00.000Z
 * parseInstant('2024-01-15')                   // 2024-01-15T00:00:00.000Z
 * ```
 */
export function parseInstant(raw: unknown, field?: string): Instant {
  if (raw instanceof Date) {
    if (!isValid(raw)) {
      throw new InvalidTimestampError(raw, field)
    }
    return new Date(raw.getTime())
  }

  if (typeof raw !== 'string') {
    throw new InvalidTimestampError(raw, field)
  }

  const value = raw.trim()
  let iso: string

  if (DATE_ONLY_PATTERN.test(value)) {
    iso = `${value}T00:00:00Z`
  } else {
    const match = DATE_TIME_PATTERN.exec(value)
    if (!match) {
      throw new InvalidTimestampError(raw, field)
    }
    iso = match[1] ? value : `${value}Z`
  }

  // parseISO 會驗證月份天數（例如 2024-02-30 回傳 Invalid Date）
  const parsed = parseISO(iso)
  if (!isValid(parsed)) {
    throw new InvalidTimestampError(raw, field)
  }

  return parsed
}

/**
 * 解析純日期（YYYY-MM-DD），用於配置中的查詢區間
 *
 * @throws {InvalidTimestampError} 格式不是 YYYY-MM-DD 或日期不存在時
 */
export function parseCalendarDate(raw: string, field?: string): Instant {
  if (!DATE_ONLY_PATTERN.test(raw.trim())) {
    throw new InvalidTimestampError(raw, field)
  }
  return parseInstant(raw, field)
}

/**
 * 是否為存在的 YYYY-MM-DD 日期
 */
export function isCalendarDate(raw: string): boolean {
  return DATE_ONLY_PATTERN.test(raw) && isValid(parseISO(`${raw}T00:00:00Z`))
}

/**
 * 計算 b - a 的天數（可能為負值，由呼叫端決定是否視為錯誤）
 *
 * @example
 * ```typescript
 * durationDays(parseInstant('2024-01-01'), parseInstant('2024-01-02T12:00:00Z')) // 1.5
 * ```
 */
export function durationDays(a: Instant, b: Instant): number {
  return (b.getTime() - a.getTime()) / MILLISECONDS_PER_DAY
}

/**
 * 計算 b - a 的小時數（可能為負值）
 */
export function durationHours(a: Instant, b: Instant): number {
  return (b.getTime() - a.getTime()) / MILLISECONDS_PER_HOUR
}

/**
 * 格式化為 YYYY-MM-DD HH:mm:ss（UTC）
 */
export function formatInstant(instant: Instant): string {
  return instant.toISOString().slice(0, 19).replace('T', ' ')
}

/**
 * 格式化為 YYYY-MM-DD（UTC）
 */
export function formatCalendarDate(instant: Instant): string {
  return instant.toISOString().slice(0, 10)
}
