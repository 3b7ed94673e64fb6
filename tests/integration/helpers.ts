import { Config } from '@oclif/core'
import { fileURLToPath } from 'node:url'

/** 專案根目錄 */
export const projectRoot = fileURLToPath(new URL('../../', import.meta.url))

/** 測試資料目錄 */
export const fixturesDir = fileURLToPath(new URL('../fixtures/', import.meta.url))

/**
 * 載入 oclif 設定（供直接建立命令實例）
 */
export async function loadCliConfig(): Promise<Config> {
  return Config.load(projectRoot)
}

/**
 * 移除 ANSI 色碼
 */
export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '')
}
