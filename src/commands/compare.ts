/**
 * Compare 命令 - 跨階段比較
 *
 * 依配置檔中的階段順序計算各世代指標，輸出比較表與首尾階段的重點變化。
 * 每個階段的日期範圍由實際解決時間推導，查詢區間僅供顯示。
 */

import { Command, Flags } from '@oclif/core'
import * as fs from 'node:fs'
import * as path from 'node:path'
import chalk from 'chalk'
import { ConfigLoader } from '../services/config/config-loader.js'
import { PhaseAnalysisService } from '../services/phase-analysis-service.js'
import { summarizeKeyChanges } from '../services/key-change-summarizer.js'
import { ComparisonTableFormatter } from '../formatters/comparison-table-formatter.js'
import { ComparisonTsvFormatter } from '../formatters/comparison-tsv-formatter.js'
import { JsonFormatter } from '../formatters/json-formatter.js'
import { AppError, ErrorType } from '../models/error.js'
import type { CohortComparison, KeyChangeSummary } from '../models/comparison.js'
import type { PhaseMetrics } from '../models/phase-metrics.js'
import { ErrorFormatter } from '../utils/error-formatter.js'
import { parseInstant } from '../utils/instant.js'
import { createLogger } from '../utils/logger.js'
import { reportDiagnostics, reportRejections } from '../utils/diagnostics-reporter.js'
import { DEFAULT_KEY_CHANGE_COUNT } from '../constants/analysis-defaults.js'

/**
 * Compare 命令類別
 */
export default class Compare extends Command {
  static description =
    '跨階段比較 - 依配置的階段順序比較 issue 或 PR 指標，並列出主要變化'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --kind prs --format tsv --output report.tsv',
    '<%= config.bin %> <%= command.id %> --actor jdoe --config team.yml',
    '<%= config.bin %> <%= command.id %> --as-of 2024-06-30 --top 3 --format json',
  ]

  static flags = {
    kind: Flags.string({
      char: 'k',
      description: '比較的紀錄類型',
      options: ['issues', 'prs'],
      default: 'issues',
    }),
    actor: Flags.string({
      char: 'a',
      description: '只比較指定負責人（issue）或作者（PR）',
    }),
    'as-of': Flags.string({
      description: '未解決 issue 的觀察終點（YYYY-MM-DD 或 ISO 8601，預設為現在）',
    }),
    format: Flags.string({
      char: 'f',
      description: '輸出格式',
      options: ['table', 'json', 'tsv'],
      default: 'table',
    }),
    output: Flags.string({
      char: 'o',
      description: '寫入檔案而非標準輸出',
    }),
    top: Flags.integer({
      description: '主要增加與減少各列出的數量',
      default: DEFAULT_KEY_CHANGE_COUNT,
      min: 1,
    }),
    config: Flags.string({
      char: 'c',
      description: '配置檔案路徑（預設：.phase-velocity.yml）',
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: '顯示被略過的紀錄與資料品質警告',
      default: false,
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Compare)
    const logger = createLogger({ verbose: flags.verbose }).child('compare')

    try {
      const { config, baseDir, sourcePath } = await new ConfigLoader().loadConfig(flags.config)
      logger.debug(`使用配置 ${sourcePath}（${config.phases.length} 個階段）`)

      const service = new PhaseAnalysisService(config, baseDir)
      const startedAt = performance.now()
      const result =
        flags.kind === 'prs'
          ? service.comparePullRequests(config.phases, { actor: flags.actor })
          : service.compareIssues(config.phases, {
              actor: flags.actor,
              asOf: flags['as-of'] ? parseInstant(flags['as-of'], '--as-of') : new Date(),
            })
      logger.performance(`${result.phases.length} 個階段分析`, performance.now() - startedAt)

      for (const { phase, rejections } of result.rejections) {
        reportRejections(logger, rejections, flags.verbose, phase)
      }
      for (const metrics of result.phases) {
        reportDiagnostics(logger, metrics.diagnostics, flags.verbose)
      }

      const keyChanges = summarizeKeyChanges(result.comparison, flags.top)
      const rendered = this.render(flags.format, result.comparison, result.phases, keyChanges)

      if (flags.output) {
        const outputPath = path.resolve(flags.output)
        try {
          fs.writeFileSync(outputPath, `${rendered}\n`, 'utf-8')
        } catch (error) {
          throw new AppError(
            ErrorType.FILE_ERROR,
            `無法寫入輸出檔案: ${outputPath}`,
            error instanceof Error ? error : undefined
          )
        }
        this.log(chalk.green(`✓ 已寫入 ${outputPath}`))
      } else {
        this.log(rendered)
      }
    } catch (error) {
      if (error instanceof AppError) {
        this.error(ErrorFormatter.format(error, flags.verbose), {
          exit: ErrorFormatter.getExitCode(error.type),
        })
      } else if (error instanceof Error) {
        this.error(`執行失敗：${error.message}`, { exit: 1 })
      } else {
        this.error('執行失敗：未知錯誤', { exit: 1 })
      }
    }
  }

  private render(
    format: string,
    comparison: CohortComparison,
    phases: readonly PhaseMetrics[],
    keyChanges: KeyChangeSummary
  ): string {
    switch (format) {
      case 'json':
        return new JsonFormatter().formatComparison(comparison, phases, keyChanges)
      case 'tsv':
        return new ComparisonTsvFormatter().format(comparison)
      default:
        return new ComparisonTableFormatter().format(comparison, keyChanges)
    }
  }
}
