import fs, { promises as fsp } from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { RotatingLogWriter } from '../writer/rotating'
import { PersistenceFailure } from '../errors'
import type { Sample } from '../types'
import { dataRows, makeTmpDir, rmTmpDir } from './helpers/fakes'

const T0 = Date.parse('2024-03-09T12:00:00.000Z')

function sample(at: number, a: number, b: string): Sample {
  return {
    capturedAt: new Date(at),
    readings: [
      { name: 'a', value: { kind: 'number', value: a }, timestamp: new Date(at) },
      { name: 'b', value: { kind: 'text', value: b }, timestamp: new Date(at) },
    ],
  }
}

describe('RotatingLogWriter', () => {
  let base: string
  const open: RotatingLogWriter[] = []

  function makeWriter(pvs = ['a', 'b']) {
    const w = new RotatingLogWriter({
      baseDir: base,
      pvs,
      derivedColumns: ['iso'],
      clock: { now: () => T0 },
    })
    open.push(w)
    return w
  }

  beforeEach(() => {
    base = makeTmpDir()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await Promise.all(open.splice(0).map(w => w.close()))
    rmTmpDir(base)
  })

  it('creates the directories, the header and the first row', async () => {
    const w = makeWriter()
    const file = await w.append(sample(T0, 1, 'x'))
    await w.close()

    expect(file).toBe(path.join(base, '2024', '03', '2024-03-09.txt'))
    expect(fs.readFileSync(file, 'utf8')).toBe([
      `# file: ${file}`,
      '# created: 2024-03-09T12:00:00.000Z',
      '# program: pvrec',
      '# column separator: tab',
      '#',
      '# time: (UTC) seconds since 1970-01-01T00:00:00 UTC',
      '#',
      'time\ta\tb\tiso8601',
      '1709985600.00\t1\tx\t2024-03-09T12:00:00.000Z',
      '',
    ].join('\n'))
  })

  it('writes the header once per file', async () => {
    const w = makeWriter()
    await w.append(sample(T0, 1, 'x'))
    const file = await w.append(sample(T0 + 10_000, 2, 'y'))

    const text = fs.readFileSync(file, 'utf8')
    expect(text.match(/^# file:/gm)).toHaveLength(1)
    expect(dataRows(file)).toEqual([
      '1709985600.00\t1\tx\t2024-03-09T12:00:00.000Z',
      '1709985610.00\t2\ty\t2024-03-09T12:00:10.000Z',
    ])
  })

  it('makes each row visible before the next append', async () => {
    const w = makeWriter()
    const file = await w.append(sample(T0, 1, 'x'))
    expect(dataRows(file)).toHaveLength(1)
  })

  it('appends to a file left by an earlier run without a second header', async () => {
    const first = makeWriter()
    const file = await first.append(sample(T0, 1, 'x'))
    await first.close()

    const second = makeWriter(['a', 'b'])
    await second.append(sample(T0 + 60_000, 3, 'z'))
    await second.close()

    const text = fs.readFileSync(file, 'utf8')
    expect(text.match(/^# file:/gm)).toHaveLength(1)
    expect(dataRows(file)).toHaveLength(2)
  })

  it('keeps the existing header even when the PV list changed', async () => {
    const first = makeWriter()
    const file = await first.append(sample(T0, 1, 'x'))
    await first.close()

    const second = makeWriter(['c'])
    await second.append({
      capturedAt: new Date(T0 + 1000),
      readings: [{ name: 'c', value: { kind: 'number', value: 7 }, timestamp: new Date(T0) }],
    })
    await second.close()

    const lines = fs.readFileSync(file, 'utf8').split('\n')
    expect(lines).toContain('time\ta\tb\tiso8601')
    expect(lines).not.toContain('time\tc\tiso8601')
    expect(lines).toContain('1709985601.00\t7\t2024-03-09T12:00:01.000Z')
  })

  it('rolls over to a new file at UTC midnight', async () => {
    const w = makeWriter()
    const before = await w.append(sample(Date.parse('2024-03-09T23:59:59.000Z'), 1, 'x'))
    const after = await w.append(sample(Date.parse('2024-03-10T00:00:01.000Z'), 2, 'y'))

    expect(before).toBe(path.join(base, '2024', '03', '2024-03-09.txt'))
    expect(after).toBe(path.join(base, '2024', '03', '2024-03-10.txt'))
    expect(w.currentFile()).toBe(after)
    expect(dataRows(before)).toEqual(['1710028799.00\t1\tx\t2024-03-09T23:59:59.000Z'])
    expect(dataRows(after)).toEqual(['1710028801.00\t2\ty\t2024-03-10T00:00:01.000Z'])
  })

  it('fails with PersistenceFailure when a file blocks the directory path', async () => {
    fs.writeFileSync(path.join(base, '2024'), 'not a directory')
    const w = makeWriter()
    await expect(w.append(sample(T0, 1, 'x'))).rejects.toBeInstanceOf(PersistenceFailure)
  })

  it('deletes a new file whose header could not be written', async () => {
    const realOpen = fsp.open.bind(fsp)
    vi.spyOn(fsp, 'open').mockImplementationOnce(async (file, flags) => {
      const handle = await realOpen(file, flags)
      vi.spyOn(handle, 'write').mockRejectedValue(new Error('ENOSPC: no space left on device'))
      return handle
    })
    const w = makeWriter()
    const file = w.pathFor(new Date(T0))

    await expect(w.append(sample(T0, 1, 'x'))).rejects.toThrow(`cannot write header to ${file}: ENOSPC: no space left on device`)
    expect(fs.existsSync(file)).toBe(false)
    expect(w.currentFile()).toBeUndefined()

    await w.append(sample(T0 + 10_000, 2, 'y'))
    const lines = fs.readFileSync(file, 'utf8').split('\n')
    expect(lines[0]).toBe(`# file: ${file}`)
    expect(lines[7]).toBe('time\ta\tb\tiso8601')
    expect(dataRows(file)).toEqual(['1709985610.00\t2\ty\t2024-03-09T12:00:10.000Z'])
  })

  it('refuses to append after close', async () => {
    const w = makeWriter()
    await w.close()
    await expect(w.append(sample(T0, 1, 'x'))).rejects.toThrow(/writer is closed/)
  })

  it('rejects samples whose columns do not match the header', async () => {
    const w = makeWriter(['b', 'a'])
    await expect(w.append(sample(T0, 1, 'x'))).rejects.toThrow(/do not match/)
  })
})
