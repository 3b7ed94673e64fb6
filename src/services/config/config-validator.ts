/**
 * 配置驗證服務
 *
 * 使用 Zod schema 驗證配置檔案，提供詳細的驗證錯誤訊息（正體中文）
 *
 * @module services/config/config-validator
 */

import type { ZodIssue } from 'zod';
import {
  PhaseVelocityConfigSchema,
  type ConfigValidationResult,
} from '../../types/config.js';

/**
 * 配置驗證服務
 *
 * 負責驗證 `.phase-velocity.yml` 的格式與內容正確性
 */
export class ConfigValidator {
  /**
   * 驗證配置檔案
   *
   * @param config - 待驗證的配置物件（任意型別）
   * @returns 驗證結果；通過時附帶套用預設值後的配置
   *
   * @example
   * ```typescript
   * const result = new ConfigValidator().validate(rawConfig);
   *
   * if (!result.valid) {
   *   result.errors.forEach(err => {
   *     console.error(`- ${err.path}: ${err.message}`);
   *   });
   * }
   * ```
   */
  validate(config: unknown): ConfigValidationResult {
    const parsed = PhaseVelocityConfigSchema.safeParse(config);

    if (parsed.success) {
      return { valid: true, config: parsed.data, errors: [] };
    }

    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : 'root',
        message: this.translateErrorMessage(issue),
        code: issue.code,
      })),
    };
  }

  /**
   * 將 Zod 驗證錯誤轉換為正體中文訊息
   *
   * @param issue - Zod 驗證問題
   * @returns 正體中文錯誤訊息
   */
  translateErrorMessage(issue: ZodIssue): string {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';

    switch (issue.code) {
      case 'invalid_type':
        return issue.received === 'undefined'
          ? `欄位「${path}」為必填`
          : `欄位「${path}」型別錯誤：期望 ${issue.expected}，實際為 ${issue.received}`;

      case 'too_small':
        return `欄位「${path}」不符合最小值限制：${issue.message}`;

      case 'too_big':
        return `欄位「${path}」不符合最大值限制：${issue.message}`;

      case 'invalid_string':
        return `欄位「${path}」格式錯誤：${issue.message}`;

      case 'invalid_enum_value':
        return `欄位「${path}」必須是 ${issue.options.join(', ')} 其中之一`;

      case 'custom':
        return `欄位「${path}」自訂驗證失敗：${issue.message || '未提供詳細訊息'}`;

      default:
        return `欄位「${path}」驗證失敗：${issue.message || '未知錯誤'}`;
    }
  }
}
