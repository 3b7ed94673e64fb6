import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest'
import * as path from 'node:path'
import type { Config } from '@oclif/core'
import Prs from '../../src/commands/prs.js'
import { fixturesDir, loadCliConfig, stripAnsi } from './helpers.js'

/**
 * Prs 命令整合測試
 */
describe('Prs Command Integration', () => {
  let config: Config

  beforeAll(async () => {
    config = await loadCliConfig()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const runPrs = async (argv: string[]): Promise<string> => {
    const command = new Prs(argv, config)
    const log = vi.spyOn(command, 'log').mockImplementation(() => undefined)
    await command.run()
    return stripAnsi(log.mock.calls.map((call) => call[0] ?? '').join('\n'))
  }

  it('預設應排除 bot 帳號開的 PR', async () => {
    const output = await runPrs(['--input', path.join(fixturesDir, 'prs-before.json'), '--format', 'json'])

    expect(JSON.parse(output)).toMatchObject({
      metrics: {
        kind: 'pull-request',
        totalPrs: 2,
        aiAssistedPrs: 0,
        aiAdoptionRate: 0,
        overall: { avgTimeToMergeDays: 3 },
      },
      rejections: [],
    })
  })

  it('--include-bots 應保留 bot 帳號開的 PR', async () => {
    const output = await runPrs([
      '--input',
      path.join(fixturesDir, 'prs-before.json'),
      '--include-bots',
      '--format',
      'json',
    ])

    expect(JSON.parse(output)).toMatchObject({ metrics: { totalPrs: 3 } })
  })

  it('應以作者限定世代並輸出表格', async () => {
    const output = await runPrs(['--input', path.join(fixturesDir, 'prs-after.json'), '--author', 'jdoe'])

    expect(output).toContain('PR 階段指標：prs-after.json（負責人：jdoe）')
    expect(output).toContain('Cursor PR')
    expect(output).toContain('100.00%')
  })
})
