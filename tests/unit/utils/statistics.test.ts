import { describe, it, expect } from 'vitest'
import {
  max,
  mean,
  min,
  percentageChange,
  present,
  ratio,
  sum,
} from '../../../src/utils/statistics.js'

/**
 * 統計工具單元測試
 */
describe('statistics', () => {
  it('sum 應依順序加總', () => {
    expect(sum([1, 2, 3])).toBe(6)
    expect(sum([])).toBe(0)
  })

  it('ratio 分母為 0 時應回傳 null', () => {
    expect(ratio(3, 2)).toBe(1.5)
    expect(ratio(0, 0)).toBeNull()
  })

  it('mean 空陣列應回傳 null 而非 0', () => {
    expect(mean([1, 2, 3, 4, 5])).toBe(3)
    expect(mean([])).toBeNull()
  })

  it('max / min 空陣列應回傳 null', () => {
    expect(max([3, 9, 1])).toBe(9)
    expect(min([3, 9, 1])).toBe(1)
    expect(max([])).toBeNull()
    expect(min([])).toBeNull()
  })

  it('percentageChange 應計算相對變化', () => {
    expect(percentageChange(4, 3)).toBe(-25)
    expect(percentageChange(2, 3)).toBe(50)
  })

  it('percentageChange 基準值為 0 時應回傳 null', () => {
    expect(percentageChange(0, 5)).toBeNull()
  })

  it('present 應移除 null 並保留順序', () => {
    expect(present([3, null, 1, null])).toEqual([3, 1])
  })
})
