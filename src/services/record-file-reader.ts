/**
 * 紀錄檔讀取
 *
 * 支援三種 JSON 外層：紀錄陣列、`{ items: [...] }`、issue tracker 搜尋匯出 `{ issues: [...] }`。
 *
 * @module services/record-file-reader
 */

import * as fs from 'node:fs'
import { AppError, ErrorType } from '../models/error.js'
import { RecordFileSchema } from '../types/records.js'
import { flattenIssueExport, isIssueExport } from './issue-export-adapter.js'

/**
 * 將已解析的 JSON 內容轉為紀錄陣列
 *
 * @throws {AppError} 外層格式無法辨識時（INVALID_INPUT）
 */
export function extractRecords(json: unknown, source: string = 'input'): unknown[] {
  if (isIssueExport(json)) {
    return flattenIssueExport(json)
  }

  const parsed = RecordFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new AppError(
      ErrorType.INVALID_INPUT,
      `${source}: 無法辨識的紀錄格式（須為陣列、{ "items": [...] } 或 { "issues": [...] }）`
    )
  }

  return parsed.data
}

/**
 * 讀取紀錄檔
 *
 * @throws {AppError} 檔案不存在或無法讀取（FILE_ERROR）、不是合法 JSON（INVALID_INPUT）
 */
export function readRecordFile(filePath: string): unknown[] {
  if (!fs.existsSync(filePath)) {
    throw new AppError(ErrorType.FILE_ERROR, `紀錄檔不存在: ${filePath}`)
  }

  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new AppError(
      ErrorType.FILE_ERROR,
      `無法讀取紀錄檔: ${filePath}`,
      error instanceof Error ? error : undefined
    )
  }

  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    throw new AppError(
      ErrorType.INVALID_INPUT,
      `紀錄檔不是合法的 JSON: ${filePath}`,
      error instanceof Error ? error : undefined
    )
  }

  return extractRecords(json, filePath)
}
