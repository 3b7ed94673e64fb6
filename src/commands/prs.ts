/**
 * Prs 命令 - 單一世代的 PR 指標與 AI 採用率
 */

import { Command, Flags } from '@oclif/core'
import * as path from 'node:path'
import { ConfigLoader } from '../services/config/config-loader.js'
import { PhaseAnalysisService } from '../services/phase-analysis-service.js'
import { readRecordFile } from '../services/record-file-reader.js'
import { PhaseMetricsTableFormatter } from '../formatters/phase-metrics-table-formatter.js'
import { JsonFormatter } from '../formatters/json-formatter.js'
import { AppError } from '../models/error.js'
import { defaultAnalysisSettings } from '../types/config.js'
import { ErrorFormatter } from '../utils/error-formatter.js'
import { createLogger } from '../utils/logger.js'
import { reportDiagnostics, reportRejections } from '../utils/diagnostics-reporter.js'

/**
 * Prs 命令類別
 */
export default class Prs extends Command {
  static description =
    'PR 指標 - 合併時間、首次審查時間、審查與評論數，並比較 AI 輔助與非 AI 的 PR'

  static examples = [
    '<%= config.bin %> <%= command.id %> --input data/prs.json',
    '<%= config.bin %> <%= command.id %> -i data/prs.json --author jdoe',
    '<%= config.bin %> <%= command.id %> -i data/prs.json --include-bots --format json',
  ]

  static flags = {
    input: Flags.string({
      char: 'i',
      description: 'PR 紀錄檔（JSON 陣列或 { "items": [...] }）',
      required: true,
    }),
    author: Flags.string({
      char: 'a',
      description: '只分析指定作者的 PR',
    }),
    'include-bots': Flags.boolean({
      description: '保留 bot 帳號開的 PR',
      default: false,
    }),
    label: Flags.string({
      description: '輸出中顯示的階段名稱',
    }),
    format: Flags.string({
      char: 'f',
      description: '輸出格式',
      options: ['table', 'json'],
      default: 'table',
    }),
    config: Flags.string({
      char: 'c',
      description: '配置檔案路徑（預設：.phase-velocity.yml，不存在時使用預設值）',
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: '顯示被略過的紀錄與資料品質警告',
      default: false,
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Prs)
    const logger = createLogger({ verbose: flags.verbose }).child('prs')

    try {
      const loaded = await new ConfigLoader().loadOptional(flags.config)
      const service = new PhaseAnalysisService(loaded?.config ?? defaultAnalysisSettings())

      const inputPath = path.resolve(flags.input)
      logger.debug(`讀取 ${inputPath}`)

      const { metrics, rejections, excludedBotPrs } = service.analyzePullRequests(
        readRecordFile(inputPath),
        {
          label: flags.label ?? path.basename(inputPath),
          actor: flags.author,
          includeBots: flags['include-bots'],
        }
      )

      if (excludedBotPrs.length > 0) {
        logger.debug(`排除 ${excludedBotPrs.length} 個 bot 帳號開的 PR`)
      }
      reportRejections(logger, rejections, flags.verbose)
      reportDiagnostics(logger, metrics.diagnostics, flags.verbose)

      if (flags.format === 'json') {
        this.log(new JsonFormatter().formatMetrics(metrics, rejections))
      } else {
        this.log(new PhaseMetricsTableFormatter().formatPullRequests(metrics))
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
}
