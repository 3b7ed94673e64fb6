/**
 * Bot 帳號過濾器
 *
 * 在聚合之前將自動化帳號開的 PR 排除在世代之外，
 * 並提供「人類審查者」、「人類評論」的判斷。
 *
 * 判斷方式：
 * 1. 以 `[bot]` 結尾的帳號
 * 2. 預設清單或配置中列出的帳號（不區分大小寫）
 */

import { DEFAULT_BOT_AUTHORS, DEFAULT_BOT_MENTIONS } from '../constants/analysis-defaults.js';
import type { CommentRecord } from '../models/work-item.js';

/**
 * 過濾結果
 */
export interface BotFilterResult<T> {
  kept: T[];
  excluded: T[];
}

/**
 * Bot 帳號過濾器類別
 */
export class BotAuthorFilter {
  private readonly botAuthors: ReadonlySet<string>;
  private readonly botMentions: readonly string[];

  /**
   * @param additionalAuthors - 配置中額外列出的帳號
   * @param botMentions - 只與 bot 對話的評論標記
   */
  constructor(
    additionalAuthors: readonly string[] = [],
    botMentions: readonly string[] = DEFAULT_BOT_MENTIONS
  ) {
    this.botAuthors = new Set(
      [...DEFAULT_BOT_AUTHORS, ...additionalAuthors].map((name) => name.toLowerCase())
    );
    this.botMentions = botMentions.map((mention) => mention.toLowerCase());
  }

  /**
   * 是否為 bot 帳號
   */
  isBot(username: string | null): boolean {
    if (!username) return false;

    const lowered = username.trim().toLowerCase();
    return lowered.endsWith('[bot]') || this.botAuthors.has(lowered);
  }

  /**
   * 內容是否在呼叫 bot（例如 `@coderabbit review`）
   */
  addressesBot(body: string): boolean {
    const lowered = body.toLowerCase();
    return this.botMentions.some((mention) => lowered.includes(mention));
  }

  /**
   * 是否為人類撰寫且不是對 bot 下指令的評論
   */
  isHumanComment(comment: CommentRecord): boolean {
    return !this.isBot(comment.author) && !this.addressesBot(comment.body);
  }

  /**
   * 依作者拆分（保留原順序）
   */
  partition<T extends { actor: string | null }>(items: readonly T[]): BotFilterResult<T> {
    const kept: T[] = [];
    const excluded: T[] = [];

    for (const item of items) {
      if (this.isBot(item.actor)) {
        excluded.push(item);
      } else {
        kept.push(item);
      }
    }

    return { kept, excluded };
  }
}
