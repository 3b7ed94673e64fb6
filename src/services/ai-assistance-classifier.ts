/**
 * AI 輔助分類器
 *
 * 掃描 commit 訊息中的 trailer 標記（例如 `Assisted-by: Cursor`），
 * 判斷工作項目是否為 AI 輔助以及使用了哪些工具。
 *
 * 沒有任何標記時回傳空陣列，代表「非 AI 輔助」，不會回傳 null。
 */

import {
  DEFAULT_AI_TOOLS,
  DEFAULT_AI_TRAILER_KEYS,
} from '../constants/analysis-defaults.js';

/**
 * 分類器設定
 */
export interface AiAssistanceClassifierOptions {
  /** 辨識的工具名稱（輸出使用此處的大小寫） */
  tools?: readonly string[];
  /** 辨識的 trailer 鍵 */
  trailerKeys?: readonly string[];
}

/**
 * 分類結果
 */
export interface AiAssistanceClassification {
  /** 依名稱排序、不重複的工具清單 */
  tools: string[];
  /** 至少含一個標記的 commit 數 */
  aiCommitCount: number;
  totalCommits: number;
}

/** `Key: value` 形式的 trailer 行 */
const TRAILER_LINE = /^\s*([A-Za-z][A-Za-z-]*)\s*:\s*(.+?)\s*$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * AI 輔助分類器類別
 */
export class AiAssistanceClassifier {
  private readonly trailerKeys: ReadonlySet<string>;
  private readonly toolPatterns: ReadonlyArray<{ tool: string; pattern: RegExp }>;

  constructor(options: AiAssistanceClassifierOptions = {}) {
    const keys = options.trailerKeys ?? DEFAULT_AI_TRAILER_KEYS;
    const tools = options.tools ?? DEFAULT_AI_TOOLS;

    this.trailerKeys = new Set(keys.map((key) => key.toLowerCase()));
    // 工具名稱須位於 trailer 值開頭（如 "Claude <noreply@...>"、"Cursor Agent"）
    this.toolPatterns = tools.map((tool) => ({
      tool,
      pattern: new RegExp(`^${escapeRegExp(tool)}(?![A-Za-z0-9])`, 'i'),
    }));
  }

  /**
   * 找出單一 commit 訊息中的工具
   */
  toolsInMessage(message: string): string[] {
    const found = new Set<string>();

    for (const line of message.split(/\r?\n/)) {
      const match = TRAILER_LINE.exec(line);
      if (!match) continue;

      const key = match[1];
      const value = match[2];
      if (key === undefined || value === undefined) continue;
      if (!this.trailerKeys.has(key.toLowerCase())) continue;

      for (const { tool, pattern } of this.toolPatterns) {
        if (pattern.test(value)) {
          found.add(tool);
        }
      }
    }

    return [...found].sort();
  }

  /**
   * 分類一組 commit 訊息
   *
   * @example
   * ```typescript
   * const classifier = new AiAssistanceClassifier();
   * classifier.classify(['fix bug', 'Assisted-by: Cursor']).tools; // ['Cursor']
   * classifier.classify(['fix bug']).tools;                        // []
   * ```
   */
  classify(messages: readonly string[]): AiAssistanceClassification {
    const tools = new Set<string>();
    let aiCommitCount = 0;

    for (const message of messages) {
      const found = this.toolsInMessage(message);
      if (found.length === 0) continue;

      aiCommitCount += 1;
      for (const tool of found) {
        tools.add(tool);
      }
    }

    return {
      tools: [...tools].sort(),
      aiCommitCount,
      totalCommits: messages.length,
    };
  }
}
