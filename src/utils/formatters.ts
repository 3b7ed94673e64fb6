/**
 * 數值顯示格式
 *
 * 不存在的值一律顯示為 `N/A`，與 0 區分。
 */

import type { MetricUnit, PhaseDelta, Trend } from '../models/comparison.js'

/** 不存在的值 */
export const ABSENT_MARKER = 'N/A'

const UNIT_SUFFIX: Record<MetricUnit, string> = {
  days: 'd',
  hours: 'h',
  count: '',
  percent: '%',
  ratio: 'x',
  'per-day': '/d',
  lines: '',
}

/**
 * 格式化數字（整數不顯示小數）
 *
 * @example
 * formatNumber(3)       // => '3'
 * formatNumber(1.13333) // => '1.13'
 * formatNumber(null)    // => 'N/A'
 */
export function formatNumber(value: number | null, decimals: number = 2): string {
  if (value === null) return ABSENT_MARKER
  return Number.isInteger(value) ? String(value) : value.toFixed(decimals)
}

/**
 * 依單位格式化指標值
 *
 * @example
 * formatMetricValue(4, 'days')        // => '4.00d'
 * formatMetricValue(1.125, 'ratio')   // => '1.13x'
 * formatMetricValue(null, 'percent')  // => 'N/A'
 */
export function formatMetricValue(value: number | null, unit: MetricUnit): string {
  if (value === null) return ABSENT_MARKER
  if (unit === 'count' || unit === 'lines') return formatNumber(value)
  return `${value.toFixed(2)}${UNIT_SUFFIX[unit]}`
}

/**
 * 格式化百分比變化（含正負號）
 *
 * @example
 * formatPercentChange(-25)  // => '-25.0%'
 * formatPercentChange(12.5) // => '+12.5%'
 */
export function formatPercentChange(change: number): string {
  const sign = change > 0 ? '+' : ''
  return `${sign}${change.toFixed(1)}%`
}

/** 趨勢標籤 */
export const TREND_LABELS: Record<Trend, string> = {
  improved: '改善',
  regressed: '退步',
  unchanged: '持平',
  changed: '變動',
}

/**
 * 格式化相鄰階段差異
 *
 * @example
 * formatDelta({ kind: 'no-longer-occurs', previous: 1.13 }, 'ratio') // => '不再出現'
 */
export function formatDelta(delta: PhaseDelta, unit: MetricUnit): string {
  switch (delta.kind) {
    case 'numeric': {
      const sign = delta.absoluteChange > 0 ? '+' : ''
      const absolute = `${sign}${formatMetricValue(delta.absoluteChange, unit)}`
      const percent = delta.percentChange === null ? '' : ` (${formatPercentChange(delta.percentChange)})`
      return `${absolute}${percent} ${TREND_LABELS[delta.trend]}`
    }
    case 'no-longer-occurs':
      return '不再出現'
    case 'newly-occurs':
      return '新出現'
    case 'not-observed':
      return ABSENT_MARKER
  }
}
