/**
 * Issues 命令 - 單一世代的 issue 階段指標
 *
 * 由 issue 紀錄檔重建每個項目的狀態歷程，計算結案時間、各狀態停留時間、
 * 重複進入率、吞吐量與類型分佈。
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
import { parseInstant } from '../utils/instant.js'
import { createLogger } from '../utils/logger.js'
import { reportDiagnostics, reportRejections } from '../utils/diagnostics-reporter.js'

/**
 * Issues 命令類別
 */
export default class Issues extends Command {
  static description =
    'Issue 階段指標 - 結案時間、各狀態平均停留、重複進入率、吞吐量與類型分佈'

  static examples = [
    '<%= config.bin %> <%= command.id %> --input data/issues.json',
    '<%= config.bin %> <%= command.id %> -i data/issues.json --actor jdoe',
    '<%= config.bin %> <%= command.id %> -i data/issues.json --as-of 2024-06-30 --format json',
  ]

  static flags = {
    input: Flags.string({
      char: 'i',
      description: 'issue 紀錄檔（JSON 陣列、{ "items": [...] } 或 issue tracker 搜尋匯出）',
      required: true,
    }),
    actor: Flags.string({
      char: 'a',
      description: '只分析指定負責人的 issue',
    }),
    'as-of': Flags.string({
      description: '未解決項目的觀察終點（YYYY-MM-DD 或 ISO 8601，預設為現在）',
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
    const { flags } = await this.parse(Issues)
    const logger = createLogger({ verbose: flags.verbose }).child('issues')

    try {
      const loaded = await new ConfigLoader().loadOptional(flags.config)
      const service = new PhaseAnalysisService(loaded?.config ?? defaultAnalysisSettings())

      const asOf = flags['as-of'] ? parseInstant(flags['as-of'], '--as-of') : new Date()
      const inputPath = path.resolve(flags.input)
      logger.debug(`讀取 ${inputPath}`)

      const { metrics, rejections } = service.analyzeIssues(readRecordFile(inputPath), {
        label: flags.label ?? path.basename(inputPath),
        actor: flags.actor,
        asOf,
      })

      reportRejections(logger, rejections, flags.verbose)
      reportDiagnostics(logger, metrics.diagnostics, flags.verbose)

      if (flags.format === 'json') {
        this.log(new JsonFormatter().formatMetrics(metrics, rejections))
      } else {
        this.log(new PhaseMetricsTableFormatter().formatIssues(metrics))
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
