/**
 * 應用程式錯誤類型
 */
export enum ErrorType {
  /** 時間戳無法解析 */
  INVALID_TIMESTAMP = 'INVALID_TIMESTAMP',

  /** 單筆紀錄結構錯誤 */
  INVALID_RECORD = 'INVALID_RECORD',

  /** 整批紀錄皆無法解析 */
  NO_VALID_RECORDS = 'NO_VALID_RECORDS',

  /** 查詢的單一項目不存在 */
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',

  /** 配置檔案錯誤 */
  INVALID_CONFIG = 'INVALID_CONFIG',

  /** 輸入參數錯誤 */
  INVALID_INPUT = 'INVALID_INPUT',

  /** 檔案讀寫錯誤 */
  FILE_ERROR = 'FILE_ERROR'
}

/**
 * 應用程式錯誤模型
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public originalError?: Error
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * 時間戳解析錯誤（附帶原始值）
 */
export class InvalidTimestampError extends AppError {
  constructor(
    public readonly raw: unknown,
    public readonly field?: string
  ) {
    super(
      ErrorType.INVALID_TIMESTAMP,
      `無法解析的時間戳${field ? `（${field}）` : ''}：${JSON.stringify(raw) ?? String(raw)}`
    )
    this.name = 'InvalidTimestampError'
  }
}
