/**
 * 配置載入服務
 *
 * 載入順序：CLI 參數（--config）→ 工作目錄的 .phase-velocity.yml
 *
 * @module services/config/config-loader
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import type { PhaseVelocityConfig } from '../../types/config.js';
import { AppError, ErrorType } from '../../models/error.js';
import { DEFAULT_CONFIG_FILE } from '../../constants/analysis-defaults.js';
import { ConfigValidator } from './config-validator.js';

/**
 * 配置載入結果
 */
export interface ConfigLoadResult {
  /** 驗證並套用預設值後的配置 */
  config: PhaseVelocityConfig;
  /** 配置來源 */
  source: 'cli' | 'project';
  /** 配置檔案絕對路徑 */
  sourcePath: string;
  /** 相對路徑的解析基準（配置檔所在目錄） */
  baseDir: string;
}

/**
 * 配置載入服務
 */
export class ConfigLoader {
  private readonly validator = new ConfigValidator();

  /**
   * @param cwd - 尋找預設配置檔的目錄
   */
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * 載入配置
   *
   * @param cliConfigPath - CLI 參數指定的配置路徑
   * @throws {AppError} 找不到、無法解析或驗證失敗時（INVALID_CONFIG / FILE_ERROR）
   *
   * @example
   * ```typescript
   * const { config, baseDir } = await new ConfigLoader().loadConfig(flags.config);
   * console.log(config.phases.map(p => p.name));
   * ```
   */
  async loadConfig(cliConfigPath?: string): Promise<ConfigLoadResult> {
    const result = await this.loadOptional(cliConfigPath);
    if (!result) {
      throw new AppError(
        ErrorType.INVALID_CONFIG,
        `找不到配置檔案 ${DEFAULT_CONFIG_FILE}。\n` +
          '請執行 `phase-velocity init` 建立配置檔，或使用 --config 參數指定配置路徑。'
      );
    }
    return result;
  }

  /**
   * 載入配置；沒有指定路徑且預設檔案不存在時返回 null
   */
  async loadOptional(cliConfigPath?: string): Promise<ConfigLoadResult | null> {
    if (cliConfigPath) {
      const sourcePath = path.resolve(this.cwd, cliConfigPath);
      return { ...this.loadFromFile(sourcePath), source: 'cli' };
    }

    const projectConfigPath = path.join(this.cwd, DEFAULT_CONFIG_FILE);
    if (!fs.existsSync(projectConfigPath)) {
      return null;
    }

    return { ...this.loadFromFile(projectConfigPath), source: 'project' };
  }

  /**
   * 從 YAML 檔案載入配置
   *
   * @throws {AppError} 當檔案不存在、解析失敗或驗證失敗時
   */
  private loadFromFile(filePath: string): Omit<ConfigLoadResult, 'source'> {
    if (!fs.existsSync(filePath)) {
      throw new AppError(ErrorType.FILE_ERROR, `配置檔案不存在: ${filePath}`);
    }

    let rawConfig: unknown;
    try {
      // 日期保留為字串（預設 schema 會轉為 Date）
      rawConfig = yaml.load(fs.readFileSync(filePath, 'utf-8'), { schema: yaml.CORE_SCHEMA });
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        throw new AppError(ErrorType.INVALID_CONFIG, `YAML 格式錯誤: ${error.message}`, error);
      }
      throw error;
    }

    const validationResult = this.validator.validate(rawConfig);
    if (!validationResult.valid) {
      const errorMessages = validationResult.errors
        .map((err) => `  - ${err.path}: ${err.message}`)
        .join('\n');

      throw new AppError(ErrorType.INVALID_CONFIG, `配置驗證失敗 (${filePath}):\n${errorMessages}`);
    }

    return {
      config: validationResult.config,
      sourcePath: filePath,
      baseDir: path.dirname(filePath),
    };
  }

  /**
   * 儲存配置到檔案
   *
   * @throws {AppError} 配置驗證失敗時（INVALID_CONFIG）
   *
   * @example
   * ```typescript
   * await new ConfigLoader().saveConfig(config, './.phase-velocity.yml');
   * ```
   */
  async saveConfig(config: unknown, filePath: string): Promise<void> {
    const validationResult = this.validator.validate(config);
    if (!validationResult.valid) {
      const errorMessages = validationResult.errors
        .map((err) => `  - ${err.path}: ${err.message}`)
        .join('\n');

      throw new AppError(ErrorType.INVALID_CONFIG, `配置驗證失敗:\n${errorMessages}`);
    }

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const yamlContent = yaml.dump(config, {
      indent: 2,
      lineWidth: 100,
      noRefs: true,
    });

    fs.writeFileSync(filePath, yamlContent, 'utf-8');
  }
}
