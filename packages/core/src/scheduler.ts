import { setTimeout as delay } from 'node:timers/promises'
import { ConnectionAbortedError, ReadFailure, errorMessage } from './errors'
import type { SourceGroup } from './group'
import {
  silentLogger,
  type Clock,
  type RecorderLogger,
  type RunOutcome,
  type RunState,
  type Sample,
  type StopReason,
} from './types'
import type { RotatingLogWriter } from './writer/rotating'

/** Wall clock plus an interruptible sleep. `sleep` resolves early (never rejects) on abort. */
export interface Timer extends Clock {
  sleep(ms: number, signal: AbortSignal): Promise<void>
}

export const systemTimer: Timer = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    if (signal.aborted) return
    try {
      await delay(ms, undefined, { signal })
    } catch (e) {
      if (!signal.aborted) throw e
    }
  },
}

export interface SchedulerOptions {
  /** Seconds between cycles */
  period: number
  /** Seconds of sampling before the run ends on its own */
  duration: number
  group: SourceGroup
  writer: RotatingLogWriter
  logger?: RecorderLogger
  timer?: Timer
}

/**
 * idle → connecting → running → stopped.
 *
 * Cycle k fires at `start + k * period`, `start` being the moment the run entered
 * `running`; the first cycle fires immediately. Ticks missed by a slow cycle are dropped,
 * not replayed. After every cycle the run ends once `duration` has passed or the next
 * tick would land past it; a tick exactly at `duration` still runs.
 *
 * stop() is cooperative: a cycle in progress finishes and writes its row, then nothing
 * else starts. Waits (connect, inter-cycle sleep) are interrupted at once.
 */
export class SamplingScheduler {
  private readonly periodMs: number
  private readonly durationMs: number
  private readonly group: SourceGroup
  private readonly writer: RotatingLogWriter
  private readonly logger: RecorderLogger
  private readonly timer: Timer
  private readonly ctl = new AbortController()

  private _state: RunState = 'idle'
  private running: Promise<RunOutcome> | null = null
  private rowsWritten = 0
  private cyclesSkipped = 0
  private startedAt?: Date
  private lastFile?: string

  constructor(opts: SchedulerOptions) {
    this.periodMs = opts.period * 1000
    this.durationMs = opts.duration * 1000
    this.group = opts.group
    this.writer = opts.writer
    this.logger = opts.logger ?? silentLogger
    this.timer = opts.timer ?? systemTimer
  }

  get state(): RunState {
    return this._state
  }

  isRunning(): boolean {
    return this._state === 'connecting' || this._state === 'running'
  }

  /** Start the run; resolves with the outcome once `stopped`. Callable once. */
  run(): Promise<RunOutcome> {
    if (this.running) return Promise.reject(new Error('scheduler has already been started'))
    this.running = this.execute()
    return this.running
  }

  stop(): void {
    if (this._state === 'stopped' || this.ctl.signal.aborted) return
    this.logger.info('stop requested')
    this.ctl.abort()
  }

  private async execute(): Promise<RunOutcome> {
    let reason: StopReason
    let error: Error | undefined

    try {
      this._state = 'connecting'
      this.logger.info(`connecting ${this.group.size} PVs`)
      await this.group.connectAll(this.ctl.signal)
      this._state = 'running'
      reason = await this.loop()
    } catch (e) {
      if (e instanceof ConnectionAbortedError) {
        reason = 'cancelled'
      } else {
        reason = 'failed'
        error = e instanceof Error ? e : new Error(String(e))
        this.logger.error(`run failed: ${error.message}`)
      }
    }

    await this.writer.close()
    await this.group.closeAll()
    this._state = 'stopped'

    const outcome: RunOutcome = {
      reason,
      rowsWritten: this.rowsWritten,
      cyclesSkipped: this.cyclesSkipped,
      startedAt: this.startedAt,
      stoppedAt: new Date(this.timer.now()),
      lastFile: this.lastFile,
      error,
    }
    this.logger.info(`recording stopped (${reason}): ${outcome.rowsWritten} rows, ${outcome.cyclesSkipped} skipped`)
    return outcome
  }

  private async loop(): Promise<StopReason> {
    const signal = this.ctl.signal
    const start = this.timer.now()
    this.startedAt = new Date(start)
    this.logger.info(`recording every ${this.periodMs / 1000}s for ${this.durationMs / 1000}s`)

    let tick = 0
    for (;;) {
      if (signal.aborted) return 'cancelled'
      await this.cycle()
      if (signal.aborted) return 'cancelled'

      const elapsed = this.timer.now() - start
      if (elapsed > this.durationMs) return 'completed'

      const next = Math.max(tick + 1, Math.floor(elapsed / this.periodMs) + 1)
      if (next > tick + 1) {
        this.logger.warn(`cycle overran the period; dropping ${next - tick - 1} tick(s)`)
      }
      const offset = next * this.periodMs
      if (offset > this.durationMs) return 'completed'

      tick = next
      await this.timer.sleep(Math.max(0, start + offset - this.timer.now()), signal)
    }
  }

  private async cycle(): Promise<void> {
    const capturedAt = new Date(this.timer.now())
    let sample: Sample
    try {
      sample = await this.group.sampleAll(capturedAt)
    } catch (e) {
      if (!(e instanceof ReadFailure)) throw e
      this.cyclesSkipped++
      this.logger.warn(`cycle skipped: ${errorMessage(e)}`)
      return
    }
    this.lastFile = await this.writer.append(sample)
    this.rowsWritten++
  }
}
