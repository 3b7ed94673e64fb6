/**
 * 世代過濾
 *
 * 依負責人限定世代。名稱比對前先正規化，
 * 讓 `jdoe@example.com`、`jdoe-2` 與 `jdoe` 視為同一人。
 */

import type { WorkItemBase } from '../models/work-item.js'
import { matchesActor } from '../utils/username.js'

/**
 * 只保留指定負責人的項目（保留原順序）
 *
 * @param actor - 未提供時返回全部項目
 */
export function filterByActor<T extends WorkItemBase>(
  items: readonly T[],
  actor: string | null | undefined,
  stripPrefixes: readonly string[] = []
): T[] {
  if (!actor) return [...items]
  return items.filter((item) => matchesActor(item.actor, actor, stripPrefixes))
}
