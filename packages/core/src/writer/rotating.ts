import { promises as fsp } from 'node:fs'
import type { FileHandle } from 'node:fs/promises'
import path from 'node:path'
import {
  DEFAULT_EXTENSION,
  DEFAULT_PROGRAM,
  type DerivedColumnId,
} from '../config'
import { PersistenceFailure, errorMessage } from '../errors'
import {
  systemClock,
  silentLogger,
  type Clock,
  type PVName,
  type RecorderLogger,
  type Sample,
} from '../types'
import {
  dailyFilePath,
  formatHeader,
  formatRow,
  resolveDerivedColumns,
  type DerivedColumn,
} from './format'

export interface RotatingLogWriterOptions {
  baseDir: string
  /** Column order of the header; samples must follow it */
  pvs: readonly PVName[]
  extension?: string
  derivedColumns?: readonly DerivedColumnId[]
  program?: string
  logger?: RecorderLogger
  /** Source of the header's `created` stamp */
  clock?: Clock
}

function errnoCode(e: unknown): string | undefined {
  return typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string'
    ? e.code
    : undefined
}

/** Exclusive create first, so "did the file exist" and "open it" are one step. */
async function openForAppend(file: string): Promise<{ handle: FileHandle; created: boolean }> {
  try {
    return { handle: await fsp.open(file, 'ax'), created: true }
  } catch (e) {
    if (errnoCode(e) !== 'EEXIST') throw e
  }
  return { handle: await fsp.open(file, 'a'), created: false }
}

/**
 * Append-only, one-file-per-UTC-day text log.
 *
 * The handle of the current day stays open between rows; the first sample that maps to
 * another path closes it and opens the next file. A file that already exists (from this
 * run or an earlier one) is appended to as-is, header untouched, even when its columns
 * were written for a different PV list.
 *
 * Not reentrant: callers await each `append` before issuing the next.
 */
export class RotatingLogWriter {
  readonly baseDir: string
  readonly extension: string
  private readonly pvs: readonly PVName[]
  private readonly program: string
  private readonly derived: DerivedColumn[]
  private readonly logger: RecorderLogger
  private readonly clock: Clock

  private handle: FileHandle | null = null
  private fileAbs?: string
  private closed = false

  constructor(opts: RotatingLogWriterOptions) {
    this.baseDir = path.resolve(opts.baseDir)
    this.extension = opts.extension ?? DEFAULT_EXTENSION
    this.pvs = [...opts.pvs]
    this.program = opts.program ?? DEFAULT_PROGRAM
    this.derived = resolveDerivedColumns(opts.derivedColumns ?? ['local'])
    this.logger = opts.logger ?? silentLogger
    this.clock = opts.clock ?? systemClock
  }

  pathFor(when: Date): string {
    return dailyFilePath(this.baseDir, when, this.extension)
  }

  currentFile(): string | undefined {
    return this.fileAbs
  }

  /** Write one row; returns the file it went to. */
  async append(sample: Sample): Promise<string> {
    if (this.closed) {
      throw new PersistenceFailure(this.fileAbs ?? this.baseDir, 'writer is closed')
    }
    const names = sample.readings.map(r => r.name)
    if (names.length !== this.pvs.length || names.some((n, i) => n !== this.pvs[i])) {
      throw new Error(`sample columns [${names.join(', ')}] do not match writer columns [${this.pvs.join(', ')}]`)
    }

    const file = this.pathFor(sample.capturedAt)
    const handle = file === this.fileAbs && this.handle ? this.handle : await this.rotateTo(file)

    const row = formatRow(sample, this.derived)
    try {
      await handle.write(row)
    } catch (e) {
      throw new PersistenceFailure(file, `append to ${file} failed: ${errorMessage(e)}`, { cause: e })
    }
    this.logger.debug(row.trimEnd())
    return file
  }

  async close(): Promise<void> {
    this.closed = true
    await this.releaseHandle()
  }

  private async rotateTo(file: string): Promise<FileHandle> {
    await this.releaseHandle()
    this.fileAbs = undefined

    const dir = path.dirname(file)
    try {
      await fsp.mkdir(dir, { recursive: true })
    } catch (e) {
      throw new PersistenceFailure(dir, `cannot create directory ${dir}: ${errorMessage(e)}`, { cause: e })
    }

    let opened: { handle: FileHandle; created: boolean }
    try {
      opened = await openForAppend(file)
    } catch (e) {
      throw new PersistenceFailure(file, `cannot open ${file}: ${errorMessage(e)}`, { cause: e })
    }

    if (opened.created) {
      const header = formatHeader({
        file,
        createdAt: new Date(this.clock.now()),
        program: this.program,
        pvs: this.pvs,
        derived: this.derived,
      })
      try {
        await opened.handle.write(header)
      } catch (e) {
        await this.discardCreated(opened.handle, file)
        throw new PersistenceFailure(file, `cannot write header to ${file}: ${errorMessage(e)}`, { cause: e })
      }
      this.logger.info(`created log file ${file}`)
    } else {
      this.logger.info(`appending to existing log file ${file}`)
    }

    this.handle = opened.handle
    this.fileAbs = file
    return opened.handle
  }

  /** Close and delete a file this writer has just created. */
  private async discardCreated(handle: FileHandle, file: string): Promise<void> {
    try {
      await handle.close()
      await fsp.unlink(file)
    } catch (e) {
      this.logger.warn(`removing headerless ${file} failed: ${errorMessage(e)}`)
    }
  }

  private async releaseHandle(): Promise<void> {
    const h = this.handle
    this.handle = null
    if (!h) return
    try {
      await h.close()
    } catch (e) {
      this.logger.warn(`closing ${this.fileAbs ?? 'log file'} failed: ${errorMessage(e)}`)
    }
  }
}
