import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { PersistenceFailure, silentLogger, type Timer } from '@pvrec/core'
import { loadConfig, type PvrecRc } from '../config'
import { runRecordCLI, type RecordCliOptions } from '../record'
import { captureConsole, makeSandbox, type Sandbox } from './helpers/sandbox'

const T0 = Date.parse('2024-03-09T12:00:00.000Z')

/** Moves only when the scheduler sleeps */
class StepTimer implements Timer {
  constructor(public t: number) {}
  now() { return this.t }
  async sleep(ms: number, signal: AbortSignal) {
    if (!signal.aborted) this.t += ms
  }
}

describe('runRecordCLI', () => {
  let sbx: Sandbox
  let cap: ReturnType<typeof captureConsole>

  beforeEach(() => {
    sbx = makeSandbox('pvrec-record-')
    cap = captureConsole()
  })

  afterEach(() => {
    cap.restore()
    sbx.cleanup()
  })

  function run(cli: PvrecRc, extra: Partial<RecordCliOptions> = {}) {
    const config = loadConfig({ path: 'logs', period: 10, duration: 25, ...cli }, { cwd: sbx.root, env: sbx.env })
    return runRecordCLI({
      config,
      timer: new StepTimer(T0),
      logger: silentLogger,
      handleSignals: false,
      summary: false,
      ...extra,
    })
  }

  const dayFile = () => path.join(sbx.root, 'logs', '2024', '03', '2024-03-09.txt')

  it('records sim PVs into the daily file and exits 0', async () => {
    const { exitCode, outcome } = await run({ pvs: ['tank:counter', 'tank:level'] })

    expect(exitCode).toBe(0)
    expect(outcome?.reason).toBe('completed')
    expect(outcome?.rowsWritten).toBe(3)
    expect(outcome?.lastFile).toBe(dayFile())

    const lines = fs.readFileSync(dayFile(), 'utf8').split('\n')
    expect(lines[7]).toBe('time\ttank:counter\ttank:level\tymd hms')
    const rows = lines.slice(8).filter(Boolean).map(l => l.split('\t'))
    expect(rows.map(r => r[0])).toEqual(['1709985600.00', '1709985610.00', '1709985620.00'])
    expect(rows.map(r => r[1])).toEqual(['0', '1', '2'])
    for (const r of rows) expect(r).toHaveLength(4)
  })

  it('keeps going when every read fails', async () => {
    const { exitCode, outcome } = await run({ pvs: ['pump:fail'] })
    expect(exitCode).toBe(0)
    expect(outcome?.rowsWritten).toBe(0)
    expect(outcome?.cyclesSkipped).toBe(3)
    expect(fs.existsSync(dayFile())).toBe(false)
  })

  it('exits 2 on an invalid configuration', async () => {
    const { exitCode, outcome } = await run({ pvs: [] })
    expect(exitCode).toBe(2)
    expect(outcome).toBeUndefined()
    expect(cap.err).toEqual(['✖ Invalid configuration:', '   • pvs: at least one PV name is required'])
  })

  it('exits 2 on an unknown source', async () => {
    const { exitCode } = await run({ pvs: ['a'], source: 'nope' })
    expect(exitCode).toBe(2)
    expect(cap.err[0]).toMatch(/^✖ Unknown source "nope"\. Available: .*sim/)
  })

  it('exits 2 when the provider rejects its options', async () => {
    const { exitCode } = await run({ pvs: ['a'], sourceOptions: { connectDelayMs: 'soon' } })
    expect(exitCode).toBe(2)
    expect(cap.err).toEqual([
      '✖ Invalid configuration:',
      '   • source sim: option "connectDelayMs" must be a number',
    ])
  })

  it('exits 1 when the log cannot be written', async () => {
    fs.writeFileSync(path.join(sbx.root, 'logs'), 'file, not a directory')
    const { exitCode, outcome } = await run({ pvs: ['a'] })
    expect(exitCode).toBe(1)
    expect(outcome?.error).toBeInstanceOf(PersistenceFailure)
    expect(cap.err[0]).toMatch(/^✖ cannot create directory /)
  })

  it('exits 130 when stopped while connecting', async () => {
    const { exitCode, outcome } = await run(
      { pvs: ['slow'], sourceOptions: { connectDelayMs: 50 } },
      { onStarted: handle => handle.stop() },
    )
    expect(exitCode).toBe(130)
    expect(outcome?.reason).toBe('cancelled')
    expect(outcome?.rowsWritten).toBe(0)
    expect(fs.existsSync(path.join(sbx.root, 'logs'))).toBe(false)
  })

  it('prints the summary by default', async () => {
    await run({ pvs: ['a:counter'] }, { summary: undefined })
    expect(cap.out).toContain('Recording summary')
    expect(cap.out).toContain('  rows:     3 (skipped cycles 0)')
    expect(cap.out).toContain('  outcome:  completed')
  })
})
