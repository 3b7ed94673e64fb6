import type { CohortComparison, KeyChangeSummary } from '../models/comparison.js'
import type { PhaseMetrics } from '../models/phase-metrics.js'
import type { RecordRejection } from '../services/record-normalizer.js'

/**
 * JSON 格式化器
 *
 * 將分析結果格式化為 JSON 輸出，適合腳本處理。
 * 時間點輸出為 ISO 8601（UTC），不存在的值輸出為 null。
 */
export class JsonFormatter {
  /**
   * 格式化單一世代指標
   *
   * @param metrics - 階段指標
   * @param rejections - 被略過的紀錄
   * @returns 格式化後的 JSON 字串
   */
  formatMetrics(metrics: PhaseMetrics, rejections: readonly RecordRejection[] = []): string {
    return JSON.stringify({ metrics, rejections }, null, 2)
  }

  /**
   * 格式化跨階段比較
   */
  formatComparison(
    comparison: CohortComparison,
    phases: readonly PhaseMetrics[],
    keyChanges: KeyChangeSummary
  ): string {
    return JSON.stringify({ comparison, keyChanges, phases }, null, 2)
  }
}
