import {
  ConnectionAbortedError,
  ConnectionFailure,
  ReadFailure,
  errorMessage,
} from './errors'
import {
  silentLogger,
  type PVName,
  type Reading,
  type RecorderLogger,
  type Sample,
  type ValueSource,
} from './types'

export interface SourceGroupOptions {
  logger?: RecorderLogger
  /** Seconds; undefined waits forever (cancel through the signal instead) */
  connectTimeout?: number
  /** Seconds each read may take before the cycle is given up */
  readTimeout?: number
}

/** Rejects with the signal's reason once it fires; never resolves. */
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    const fire = () => {
      const reason: unknown = signal.reason
      reject(reason instanceof Error ? reason : new ConnectionAbortedError())
    }
    if (signal.aborted) fire()
    else signal.addEventListener('abort', fire, { once: true })
  })
}

async function withTimeout<T>(p: Promise<T>, ms: number | undefined, onTimeout: () => Error): Promise<T> {
  if (ms === undefined) return p
  let timer: NodeJS.Timeout | undefined
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms)
  })
  try {
    return await Promise.race([p, expired])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * The ordered set of sources of one run. Column order of every sample (and of the log
 * header) is the order the sources were given in.
 */
export class SourceGroup {
  private readonly sources: readonly ValueSource[]
  private readonly logger: RecorderLogger
  private readonly connectTimeoutMs?: number
  private readonly readTimeoutMs?: number

  constructor(sources: readonly ValueSource[], opts: SourceGroupOptions = {}) {
    this.sources = [...sources]
    this.logger = opts.logger ?? silentLogger
    this.connectTimeoutMs = opts.connectTimeout === undefined ? undefined : opts.connectTimeout * 1000
    this.readTimeoutMs = opts.readTimeout === undefined ? undefined : opts.readTimeout * 1000
  }

  get names(): PVName[] {
    return this.sources.map(s => s.name)
  }

  get size(): number {
    return this.sources.length
  }

  pending(): PVName[] {
    return this.sources.filter(s => !s.isReady()).map(s => s.name)
  }

  /**
   * Connect every source and block until all of them are ready. Sources connect
   * concurrently. Rejects with ConnectionAbortedError when `signal` fires and with
   * ConnectionFailure when a connect request fails or the connect timeout elapses.
   */
  async connectAll(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new ConnectionAbortedError()

    const requested = await Promise.allSettled(this.sources.map(s => s.connect()))
    const refused: PVName[] = []
    let firstCause: unknown
    requested.forEach((r, i) => {
      if (r.status === 'rejected') {
        refused.push(this.sources[i]?.name ?? `#${i}`)
        firstCause ??= r.reason
      }
    })
    if (refused.length) {
      throw new ConnectionFailure(
        refused,
        `connect failed for ${refused.join(', ')}: ${errorMessage(firstCause)}`,
        { cause: firstCause },
      )
    }

    const ctl = new AbortController()
    const forward = () => ctl.abort(new ConnectionAbortedError())
    signal?.addEventListener('abort', forward, { once: true })
    if (signal?.aborted) forward()

    let timer: NodeJS.Timeout | undefined
    if (this.connectTimeoutMs !== undefined) {
      const seconds = this.connectTimeoutMs / 1000
      timer = setTimeout(() => {
        const late = this.pending()
        ctl.abort(new ConnectionFailure(late, `not connected after ${seconds}s: ${late.join(', ')}`))
      }, this.connectTimeoutMs)
    }

    try {
      const waits = this.sources.map(s => {
        if (s.isReady()) return Promise.resolve()
        this.logger.debug(`waiting for ${s.name} to connect`)
        return s.waitUntilReady(ctl.signal)
      })
      await Promise.race([Promise.all(waits), rejectOnAbort(ctl.signal)])
    } catch (e) {
      if (ctl.signal.aborted) {
        const reason: unknown = ctl.signal.reason
        throw reason instanceof Error ? reason : new ConnectionAbortedError()
      }
      const late = this.pending()
      throw new ConnectionFailure(late, `waiting for ${late.join(', ') || 'sources'} failed: ${errorMessage(e)}`, { cause: e })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', forward)
    }

    this.logger.info(`all ${this.sources.length} PVs connected`)
  }

  /**
   * Read every source (concurrently) and assemble the readings in group order. Any single
   * failure fails the whole sample with a ReadFailure for the first failing PV.
   */
  async sampleAll(capturedAt: Date): Promise<Sample> {
    const settled = await Promise.allSettled(
      this.sources.map(s =>
        withTimeout(
          s.read(),
          this.readTimeoutMs,
          () => new ReadFailure(s.name, `read of ${s.name} timed out after ${(this.readTimeoutMs ?? 0) / 1000}s`),
        ),
      ),
    )

    const readings: Reading[] = []
    for (const [i, r] of settled.entries()) {
      const name = this.sources[i]?.name ?? `#${i}`
      if (r.status === 'rejected') {
        const reason: unknown = r.reason
        if (reason instanceof ReadFailure) throw reason
        throw new ReadFailure(name, `read of ${name} failed: ${errorMessage(reason)}`, { cause: reason })
      }
      readings.push({ ...r.value, name })
    }
    return { capturedAt, readings }
  }

  async closeAll(): Promise<void> {
    const closing = this.sources.map(async s => {
      if (!s.close) return
      try {
        await s.close()
      } catch (e) {
        this.logger.warn(`closing ${s.name} failed: ${errorMessage(e)}`)
      }
    })
    await Promise.all(closing)
  }
}
