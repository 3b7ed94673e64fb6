import { AppError, ErrorType } from '../models/error.js'

/**
 * 錯誤訊息格式化器
 *
 * 將應用程式錯誤轉換為使用者友善的正體中文訊息
 */
export class ErrorFormatter {
  /**
   * 錯誤類型對應的正體中文訊息（錯誤本身沒有訊息時使用）
   */
  private static readonly ERROR_MESSAGES: Record<ErrorType, string> = {
    [ErrorType.INVALID_TIMESTAMP]: '時間戳格式無法解析',
    [ErrorType.INVALID_RECORD]: '紀錄結構錯誤',
    [ErrorType.NO_VALID_RECORDS]: '沒有任何可分析的紀錄',
    [ErrorType.ITEM_NOT_FOUND]: '找不到指定的項目',
    [ErrorType.INVALID_CONFIG]: '配置檔案錯誤',
    [ErrorType.INVALID_INPUT]: '輸入格式錯誤',
    [ErrorType.FILE_ERROR]: '檔案讀寫失敗'
  }

  /**
   * 錯誤類型對應的建議動作
   */
  private static readonly SUGGESTED_ACTIONS: Record<ErrorType, string[]> = {
    [ErrorType.INVALID_TIMESTAMP]: [
      '時間欄位支援 ISO 8601（如 2024-01-15T10:30:00Z、2024-01-15T10:30:00.000+0800）',
      '日期參數請使用 YYYY-MM-DD 格式'
    ],
    [ErrorType.INVALID_RECORD]: [
      '確認紀錄包含 id 與 createdAt 欄位',
      '使用 --verbose 查看被略過紀錄的欄位與原因'
    ],
    [ErrorType.NO_VALID_RECORDS]: [
      '確認輸入檔為正規化紀錄陣列、{ "items": [...] } 或 issue tracker 搜尋匯出 { "issues": [...] }',
      '檢查時間欄位格式是否正確'
    ],
    [ErrorType.ITEM_NOT_FOUND]: [
      '確認項目 ID 存在於輸入檔中'
    ],
    [ErrorType.INVALID_CONFIG]: [
      '執行 `phase-velocity init` 產生配置檔範本',
      '確認每個階段都有 name、start、end（YYYY-MM-DD）',
      '確認比較所需的 issues 或 pullRequests 紀錄檔已在階段中指定'
    ],
    [ErrorType.INVALID_INPUT]: [
      '檢查命令參數是否正確',
      '使用 --help 查看可用參數'
    ],
    [ErrorType.FILE_ERROR]: [
      '確認檔案路徑正確且具有讀寫權限',
      '相對路徑以配置檔所在目錄為基準'
    ]
  }

  private static readonly TYPE_LABELS: Record<ErrorType, string> = {
    [ErrorType.INVALID_TIMESTAMP]: 'Timestamp',
    [ErrorType.INVALID_RECORD]: 'Record',
    [ErrorType.NO_VALID_RECORDS]: 'No Valid Records',
    [ErrorType.ITEM_NOT_FOUND]: 'Not Found',
    [ErrorType.INVALID_CONFIG]: 'Configuration',
    [ErrorType.INVALID_INPUT]: 'Validation',
    [ErrorType.FILE_ERROR]: 'File'
  }

  /**
   * 退出碼：1 一般錯誤、2 配置、3 檔案、4 參數或時間戳、5 紀錄
   */
  private static readonly EXIT_CODES: Record<ErrorType, number> = {
    [ErrorType.ITEM_NOT_FOUND]: 1,
    [ErrorType.INVALID_CONFIG]: 2,
    [ErrorType.FILE_ERROR]: 3,
    [ErrorType.INVALID_INPUT]: 4,
    [ErrorType.INVALID_TIMESTAMP]: 4,
    [ErrorType.NO_VALID_RECORDS]: 5,
    [ErrorType.INVALID_RECORD]: 5
  }

  /**
   * 格式化錯誤訊息
   *
   * ```
   * Error: <TYPE> - <REASON>
   *
   * Suggestion:
   *   • <ACTION>
   * ```
   * verbose 模式另附原始錯誤與前 5 行堆疊。
   */
  static format(error: AppError, verbose: boolean = false): string {
    const sections: string[][] = [
      [`Error: ${this.TYPE_LABELS[error.type]} - ${this.getMessage(error)}`]
    ]

    const actions = this.getSuggestedActions(error)
    if (actions.length > 0) {
      sections.push(['Suggestion:', ...actions.map(action => `  • ${action}`)])
    }

    const cause = error.originalError
    if (verbose && cause) {
      const details = [
        'Technical Details (--verbose):',
        `  Error Type: ${error.type}`,
        `  Original Message: ${cause.message}`
      ]
      if (cause.stack) {
        details.push('  Stack Trace:', ...cause.stack.split('\n').slice(0, 5).map(line => `    ${line}`))
      }
      sections.push(details)
    }

    return `\n${sections.map(lines => lines.join('\n')).join('\n\n')}\n`
  }

  /**
   * 取得錯誤訊息（錯誤本身沒有訊息時使用類型預設訊息）
   */
  static getMessage(error: AppError): string {
    return error.message || this.ERROR_MESSAGES[error.type]
  }

  static getSuggestedActions(error: AppError): string[] {
    return this.SUGGESTED_ACTIONS[error.type]
  }

  static getExitCode(errorType: ErrorType): number {
    return this.EXIT_CODES[errorType]
  }
}
