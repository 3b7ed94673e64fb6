/**
 * 比較表 TSV 匯出器
 *
 * 第一行為「指標」加上各階段名稱，之後每個指標一行，適合貼到試算表。
 */

import type { CohortComparison } from '../models/comparison.js';
import { formatMetricValue } from '../utils/formatters.js';

/**
 * 比較表 TSV 匯出器
 */
export class ComparisonTsvFormatter {
  /**
   * 將比較結果匯出為 TSV
   *
   * @example
   * ```typescript
   * new ComparisonTsvFormatter().format(comparison);
   * // 指標\tBefore\tAfter
   * // 平均結案時間\t4.00d\t3.00d
   * ```
   */
  format(comparison: CohortComparison): string {
    const lines: string[] = [];

    lines.push(['指標', ...comparison.phases.map((p) => p.label)].map((cell) => this.escapeTSV(cell)).join('\t'));

    for (const row of comparison.rows) {
      const cells = [row.label, ...row.values.map((value) => formatMetricValue(value, row.unit))];
      lines.push(cells.map((cell) => this.escapeTSV(cell)).join('\t'));
    }

    return lines.join('\n');
  }

  /**
   * 移除會破壞欄位的 tab 與換行
   */
  escapeTSV(value: string): string {
    return value.replace(/[\t\r\n]+/g, ' ');
  }
}
