/**
 * Init 命令 - 建立階段配置檔
 *
 * 互動模式逐一詢問階段名稱、查詢區間與紀錄檔；
 * 非互動模式由 --phase 參數提供（適用於 CI/CD）。
 */

import { Command, Flags } from '@oclif/core';
import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { input, confirm } from '@inquirer/prompts';
import { ConfigLoader } from '../services/config/config-loader.js';
import { AppError } from '../models/error.js';
import type { PhaseConfig } from '../types/config.js';
import {
  DEFAULT_AI_TOOLS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_REENTRY_WARNING_THRESHOLD,
  DEFAULT_TRACKED_STATES,
} from '../constants/analysis-defaults.js';
import { ErrorFormatter } from '../utils/error-formatter.js';
import { isCalendarDate } from '../utils/instant.js';

/**
 * 解析 `name:start:end` 形式的階段參數
 *
 * @returns 格式錯誤時返回 null
 */
export function parsePhaseFlag(value: string, index: number): PhaseConfig | null {
  const match = /^(.+):(\d{4}-\d{2}-\d{2}):(\d{4}-\d{2}-\d{2})$/.exec(value.trim());
  if (!match) return null;

  const [, name, start, end] = match;
  if (name === undefined || start === undefined || end === undefined) return null;

  return {
    name: name.trim(),
    start,
    end,
    issues: `data/issues-${index + 1}.json`,
    pullRequests: `data/prs-${index + 1}.json`,
  };
}

/**
 * Init 命令類別
 */
export default class Init extends Command {
  static description = '建立階段配置檔（.phase-velocity.yml）';

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --output team.yml',
    '<%= config.bin %> <%= command.id %> -y --phase "Before:2024-01-01:2024-03-31" --phase "After:2024-04-01:2024-06-30"',
  ];

  static flags = {
    output: Flags.string({
      char: 'o',
      description: `輸出檔案路徑（預設：${DEFAULT_CONFIG_FILE}）`,
      default: DEFAULT_CONFIG_FILE,
    }),
    phase: Flags.string({
      char: 'p',
      description: '階段定義「名稱:開始日期:結束日期」，依比較順序重複指定',
      multiple: true,
    }),
    force: Flags.boolean({
      char: 'f',
      description: '強制覆寫既有配置檔案',
      default: false,
    }),
    'non-interactive': Flags.boolean({
      char: 'y',
      description: '非互動模式（須提供 --phase）',
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Init);
    const nonInteractive = flags['non-interactive'];
    const outputPath = path.resolve(flags.output);

    this.log(chalk.cyan(nonInteractive ? '📝 階段配置初始化（非互動模式）\n' : '📝 階段配置初始化精靈\n'));

    if (fs.existsSync(outputPath) && !flags.force) {
      if (nonInteractive) {
        this.error(`檔案 "${outputPath}" 已存在。非互動模式下請使用 --force 強制覆寫`, { exit: 2 });
      }

      const overwrite = await confirm({
        message: `檔案 "${outputPath}" 已存在，是否覆寫？`,
        default: false,
      });
      if (!overwrite) {
        this.log(chalk.yellow('已取消配置初始化'));
        return;
      }
    }

    const phases = nonInteractive
      ? this.phasesFromFlags(flags.phase ?? [])
      : await this.promptPhases();

    const config = {
      phases,
      workflow: {
        states: [...DEFAULT_TRACKED_STATES],
        reentryWarningThreshold: DEFAULT_REENTRY_WARNING_THRESHOLD,
      },
      ai: {
        tools: [...DEFAULT_AI_TOOLS],
      },
    };

    try {
      await new ConfigLoader().saveConfig(config, outputPath);
    } catch (error) {
      if (error instanceof AppError) {
        this.error(ErrorFormatter.format(error), { exit: ErrorFormatter.getExitCode(error.type) });
      }
      throw error;
    }

    this.log(chalk.green(`\n✓ 配置檔案已成功建立: ${outputPath}\n`));
    this.log(chalk.gray('下一步：'));
    this.log(chalk.gray('  1. 將各階段的紀錄檔放到配置中指定的路徑'));
    this.log(chalk.gray(`  2. 執行 phase-velocity compare --config ${flags.output}`));
  }

  /**
   * 由 --phase 參數建立階段
   */
  private phasesFromFlags(values: readonly string[]): PhaseConfig[] {
    if (values.length === 0) {
      this.error('非互動模式必須提供至少一個 --phase 參數（格式：名稱:YYYY-MM-DD:YYYY-MM-DD）', { exit: 4 });
    }

    return values.map((value, index) => {
      const phase = parsePhaseFlag(value, index);
      if (!phase) {
        this.error(`無效的階段參數: "${value}"（格式：名稱:YYYY-MM-DD:YYYY-MM-DD）`, { exit: 4 });
      }
      return phase;
    });
  }

  /**
   * 互動式詢問階段
   */
  private async promptPhases(): Promise<PhaseConfig[]> {
    const phases: PhaseConfig[] = [];
    const validateDate = (value: string): boolean | string =>
      isCalendarDate(value.trim()) || '請輸入 YYYY-MM-DD 格式的日期';

    do {
      const index = phases.length;
      this.log(chalk.cyan(`\n階段 ${index + 1}`));

      const name = await input({
        message: '階段名稱',
        default: index === 0 ? 'Before' : `Phase ${index + 1}`,
        validate: (value) => value.trim() !== '' || '階段名稱不可為空',
      });
      const start = await input({ message: '查詢區間開始日期', validate: validateDate });
      const end = await input({
        message: '查詢區間結束日期',
        validate: (value) =>
          validateDate(value) === true && value.trim() < start.trim()
            ? '結束日期不可早於開始日期'
            : validateDate(value),
      });
      const issues = await input({ message: 'issue 紀錄檔', default: `data/issues-${index + 1}.json` });
      const pullRequests = await input({ message: 'PR 紀錄檔', default: `data/prs-${index + 1}.json` });

      phases.push({
        name: name.trim(),
        start: start.trim(),
        end: end.trim(),
        issues: issues.trim(),
        pullRequests: pullRequests.trim(),
      });
    } while (await confirm({ message: '新增另一個階段？', default: phases.length < 2 }));

    return phases;
  }
}
