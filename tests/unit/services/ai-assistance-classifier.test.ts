import { describe, it, expect } from 'vitest'
import { AiAssistanceClassifier } from '../../../src/services/ai-assistance-classifier.js'

/**
 * AI 輔助分類器單元測試
 */
describe('AiAssistanceClassifier', () => {
  const classifier = new AiAssistanceClassifier()

  it('應由 trailer 辨識工具', () => {
    expect(classifier.classify(['fix bug', 'Assisted-by: Cursor'])).toEqual({
      tools: ['Cursor'],
      aiCommitCount: 1,
      totalCommits: 2,
    })
  })

  it('沒有標記時應回傳空陣列而非 null', () => {
    expect(classifier.classify(['fix bug']).tools).toEqual([])
  })

  it('沒有 commit 時應視為非 AI 輔助', () => {
    expect(classifier.classify([])).toEqual({ tools: [], aiCommitCount: 0, totalCommits: 0 })
  })

  it('應辨識多行訊息中的 trailer 並忽略大小寫', () => {
    const message = 'Add retry logic\n\nBody text\n\nco-authored-by: claude <noreply@example.com>'

    expect(classifier.toolsInMessage(message)).toEqual(['Claude'])
  })

  it('多個工具應依名稱排序且不重複', () => {
    const result = classifier.classify([
      'Generated-by: Cursor Agent',
      'Assisted-by: Claude\nAssisted-by: Cursor',
    ])

    expect(result.tools).toEqual(['Claude', 'Cursor'])
    expect(result.aiCommitCount).toBe(2)
  })

  it('非 trailer 行提到工具名稱不應計入', () => {
    expect(classifier.toolsInMessage('Mention Claude in the README')).toEqual([])
  })

  it('不在辨識清單中的 trailer 鍵不應計入', () => {
    expect(classifier.toolsInMessage('Reviewed-by: Claude')).toEqual([])
  })

  it('工具名稱須為完整單字', () => {
    expect(classifier.toolsInMessage('Co-authored-by: Cursory Reviewer')).toEqual([])
  })

  it('應使用自訂的工具與 trailer 鍵', () => {
    const custom = new AiAssistanceClassifier({ tools: ['Copilot'], trailerKeys: ['AI-Tool'] })

    expect(custom.toolsInMessage('AI-Tool: copilot')).toEqual(['Copilot'])
    expect(custom.toolsInMessage('Assisted-by: Copilot')).toEqual([])
  })
})
