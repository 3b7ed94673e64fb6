/**
 * 診斷資訊輸出
 *
 * 將被略過的紀錄與資料品質警告寫到日誌（stderr），不影響 stdout 的分析結果。
 */

import type { ItemDiagnostics } from '../models/phase-metrics.js'
import type { RecordRejection } from '../services/record-normalizer.js'
import type { Logger } from './logger.js'

/**
 * 輸出被略過的紀錄
 *
 * 摘要一律輸出；逐筆原因僅在 verbose 時輸出。
 */
export function reportRejections(
  logger: Logger,
  rejections: readonly RecordRejection[],
  verbose: boolean,
  scope?: string
): void {
  if (rejections.length === 0) return

  logger.warn(`${scope ? `${scope}: ` : ''}略過 ${rejections.length} 筆無法解析的紀錄`)
  if (!verbose) return

  for (const rejection of rejections) {
    const id = rejection.id ? ` (${rejection.id})` : ''
    const field = rejection.field ? ` [${rejection.field}]` : ''
    logger.warn(`  - #${rejection.index}${id}${field}: ${rejection.reason}`)
  }
}

/**
 * 輸出資料品質警告
 */
export function reportDiagnostics(
  logger: Logger,
  diagnostics: readonly ItemDiagnostics[],
  verbose: boolean
): void {
  if (!verbose) return

  for (const item of diagnostics) {
    logger.dataQuality(
      item.itemId,
      item.warnings.map((w) => w.message)
    )
  }
}
