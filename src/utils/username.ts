/**
 * 負責人名稱正規化
 *
 * 讓同一個人在 issue tracker 與 code host 的不同帳號表示法對應到同一個識別字。
 *
 * @module utils/username
 */

/**
 * 正規化負責人名稱
 *
 * 依序：去除前後空白並轉小寫、移除 email 網域、移除第一個符合的前綴、移除 `-<數字>` 結尾。
 *
 * @param name - 原始名稱
 * @param stripPrefixes - 要移除的前綴（不區分大小寫）
 *
 * @example
 * ```typescript
 * normalizeUsername('Jane.Doe@example.com') // 'jane.doe'
 * normalizeUsername('jdoe-2')               // 'jdoe'
 * normalizeUsername('ext-jdoe', ['ext-'])   // 'jdoe'
 * ```
 */
export function normalizeUsername(name: string, stripPrefixes: readonly string[] = []): string {
  let normalized = name.trim().toLowerCase()

  const at = normalized.indexOf('@')
  if (at >= 0) {
    normalized = normalized.slice(0, at)
  }

  for (const prefix of stripPrefixes) {
    const lowered = prefix.toLowerCase()
    if (lowered && normalized.startsWith(lowered) && normalized.length > lowered.length) {
      normalized = normalized.slice(lowered.length)
      break
    }
  }

  return normalized.replace(/-\d+$/, '')
}

/**
 * 判斷兩個名稱正規化後是否相同
 */
export function matchesActor(
  candidate: string | null,
  actor: string,
  stripPrefixes: readonly string[] = []
): boolean {
  if (candidate === null) return false
  return normalizeUsername(candidate, stripPrefixes) === normalizeUsername(actor, stripPrefixes)
}
