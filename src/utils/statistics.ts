/**
 * 統計工具函數
 *
 * 所有聚合都依輸入陣列順序累加，確保相同輸入得到逐位元相同的浮點結果。
 * 空輸入或除以零一律回傳 null（不存在），不與真正的 0 混淆。
 *
 * @module utils/statistics
 */

/**
 * 依輸入順序加總
 *
 * @example
 * ```typescript
 * sum([1, 2, 3]) // 6
 * ```
 */
export function sum(numbers: readonly number[]): number {
  let total = 0
  for (const n of numbers) {
    total += n
  }
  return total
}

/**
 * 安全除法
 *
 * @returns 分母為 0 時返回 null
 */
export function ratio(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null
  return numerator / denominator
}

/**
 * 計算平均值
 *
 * @returns 平均值，若陣列為空則返回 null
 *
 * @example
 * ```typescript
 * mean([1, 2, 3, 4, 5]) // 3
 * mean([])              // null
 * ```
 */
export function mean(numbers: readonly number[]): number | null {
  return ratio(sum(numbers), numbers.length)
}

/**
 * 計算最大值
 *
 * @returns 最大值，若陣列為空則返回 null
 */
export function max(numbers: readonly number[]): number | null {
  if (numbers.length === 0) return null
  return Math.max(...numbers)
}

/**
 * 計算最小值
 *
 * @returns 最小值，若陣列為空則返回 null
 */
export function min(numbers: readonly number[]): number | null {
  if (numbers.length === 0) return null
  return Math.min(...numbers)
}

/**
 * 計算百分比變化（(after - before) / before * 100）
 *
 * @returns 基準值為 0 時無法計算，返回 null
 *
 * @example
 * ```typescript
 * percentageChange(4, 3) // -25
 * ```
 */
export function percentageChange(before: number, after: number): number | null {
  const change = ratio(after - before, before)
  return change === null ? null : change * 100
}

/**
 * 取出非 null 值（保留順序）
 */
export function present(values: ReadonlyArray<number | null>): number[] {
  return values.filter((v): v is number => v !== null)
}
