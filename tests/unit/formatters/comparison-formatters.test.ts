import { describe, it, expect } from 'vitest'
import { ComparisonTsvFormatter } from '../../../src/formatters/comparison-tsv-formatter.js'
import { ComparisonTableFormatter } from '../../../src/formatters/comparison-table-formatter.js'
import type { CohortComparison, KeyChangeSummary } from '../../../src/models/comparison.js'

const stripAnsi = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '')

/**
 * 比較表輸出格式單元測試
 */
describe('comparison formatters', () => {
  const comparison: CohortComparison = {
    actor: null,
    phases: [
      {
        label: 'Before',
        queryWindow: { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-01-31T00:00:00Z') },
        dateRange: {
          start: new Date('2024-01-06T00:00:00Z'),
          end: new Date('2024-01-16T00:00:00Z'),
          days: 10,
        },
      },
      { label: 'After', queryWindow: null, dateRange: null },
    ],
    rows: [
      {
        key: 'closure.averageDays',
        label: '平均結案時間',
        unit: 'days',
        polarity: 'lower-is-better',
        values: [4, 3],
        deltas: [{ kind: 'numeric', absoluteChange: -1, percentChange: -25, trend: 'improved' }],
      },
      {
        key: 'state.Review.reentryRate',
        label: 'Review 重複進入率',
        unit: 'ratio',
        polarity: 'lower-is-better',
        values: [1.125, null],
        deltas: [{ kind: 'no-longer-occurs', previous: 1.125 }],
      },
      {
        key: 'itemCount',
        label: 'Issue 數',
        unit: 'count',
        polarity: 'neutral',
        values: [0, 12],
        deltas: [{ kind: 'numeric', absoluteChange: 12, percentChange: null, trend: 'changed' }],
      },
    ],
  }

  describe('ComparisonTsvFormatter', () => {
    it('第一行為階段名稱，之後每個指標一行', () => {
      const lines = new ComparisonTsvFormatter().format(comparison).split('\n')

      expect(lines).toEqual([
        '指標\tBefore\tAfter',
        '平均結案時間\t4.00d\t3.00d',
        'Review 重複進入率\t1.13x\tN/A',
        'Issue 數\t0\t12',
      ])
    })

    it('應移除儲存格中的 tab 與換行', () => {
      expect(new ComparisonTsvFormatter().escapeTSV('a\tb\nc')).toBe('a b c')
    })
  })

  describe('ComparisonTableFormatter', () => {
    const keyChanges: KeyChangeSummary = {
      increases: [],
      decreases: [
        {
          key: 'closure.averageDays',
          label: '平均結案時間',
          unit: 'days',
          before: 4,
          after: 3,
          percentChange: -25,
        },
      ],
    }

    it('應列出階段資訊與各指標的變化', () => {
      const output = stripAnsi(new ComparisonTableFormatter().format(comparison, keyChanges))

      expect(output).toContain('階段比較（整個團隊）')
      expect(output).toContain(
        '  階段 1：Before（查詢區間 2024-01-01 ~ 2024-01-31，實際範圍 2024-01-06 ~ 2024-01-16）'
      )
      expect(output).toContain('  階段 2：After（查詢區間 N/A，實際範圍 N/A）')
      expect(output).toContain('-1.00d (-25.0%) 改善')
      expect(output).toContain('不再出現')
      expect(output).toContain('+12 變動')
    })

    it('應列出主要增加與減少', () => {
      const output = stripAnsi(new ComparisonTableFormatter().format(comparison, keyChanges))

      expect(output).toContain('主要增加：\n  • 沒有增加的指標')
      expect(output).toContain('主要減少：\n  • 平均結案時間: 4.00d → 3.00d (-25.0%)')
    })

    it('限定負責人時應顯示於標題', () => {
      const output = stripAnsi(new ComparisonTableFormatter().format({ ...comparison, actor: 'jdoe' }))

      expect(output).toContain('階段比較（負責人：jdoe）')
      expect(output).not.toContain('主要增加')
    })
  })
})
