import type { PVName, Reading, ValueSource } from '@pvrec/core'
import {
  ReadinessLatch,
  numberValue,
  readNumberOption,
  textValue,
  type SourceContext,
  type SourceProvider,
} from '@pvrec/source-types'

export type SimKind = 'wave' | 'counter' | 'datetime' | 'uptime' | 'fail'

/** The PV name's last `:segment` picks the generator; anything unknown is a wave. */
export function simKindOf(name: PVName): SimKind {
  const suffix = name.slice(name.lastIndexOf(':') + 1).toLowerCase()
  switch (suffix) {
    case 'counter': return 'counter'
    case 'datetime': return 'datetime'
    case 'uptime': return 'uptime'
    case 'fail': return 'fail'
    default: return 'wave'
  }
}

/** Small stable hash so every wave PV gets its own offset and phase */
function seedOf(name: string): number {
  let h = 2166136261
  for (let i = 0; i < name.length; i++) {
    h ^= name.charCodeAt(i)
    h = Math.imul(h, 16777619)
  }
  return (h >>> 0) / 0xffffffff
}

/** `HH:MM:SS`, prefixed by `N day(s), ` past the first day */
export function formatUptime(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000))
  const days = Math.floor(total / 86400)
  const hh = String(Math.floor((total % 86400) / 3600)).padStart(2, '0')
  const mm = String(Math.floor((total % 3600) / 60)).padStart(2, '0')
  const ss = String(total % 60).padStart(2, '0')
  const clock = `${hh}:${mm}:${ss}`
  if (days === 0) return clock
  return `${days} ${days === 1 ? 'day' : 'days'}, ${clock}`
}

export interface SimSourceOptions {
  /** Delay between `connect()` and readiness */
  connectDelayMs?: number
  now?: () => number
}

export class SimSource implements ValueSource {
  readonly kind: SimKind
  private readonly latch = new ReadinessLatch()
  private readonly now: () => number
  private readonly connectDelayMs: number
  private connectedAt = 0
  private count = 0
  private timer?: NodeJS.Timeout

  constructor(readonly name: PVName, opts: SimSourceOptions = {}) {
    this.kind = simKindOf(name)
    this.now = opts.now ?? Date.now
    this.connectDelayMs = opts.connectDelayMs ?? 0
  }

  async connect(): Promise<void> {
    if (this.latch.isSet || this.timer) return
    const ready = () => {
      this.timer = undefined
      this.connectedAt = this.now()
      this.latch.set()
    }
    if (this.connectDelayMs <= 0) ready()
    else this.timer = setTimeout(ready, this.connectDelayMs)
  }

  isReady(): boolean {
    return this.latch.isSet
  }

  waitUntilReady(signal?: AbortSignal): Promise<void> {
    return this.latch.wait(signal)
  }

  async read(): Promise<Reading> {
    if (!this.latch.isSet) throw new Error(`${this.name} is not connected`)
    const t = this.now()
    const timestamp = new Date(t)

    switch (this.kind) {
      case 'counter':
        return { name: this.name, value: numberValue(this.count++), timestamp }
      case 'datetime':
        return { name: this.name, value: textValue(timestamp.toISOString()), timestamp }
      case 'uptime':
        return { name: this.name, value: textValue(formatUptime(t - this.connectedAt)), timestamp }
      case 'fail':
        throw new Error(`${this.name} has no value`)
      case 'wave': {
        const seed = seedOf(this.name)
        const offset = 10 + seed * 40
        const phase = seed * 2 * Math.PI
        const value = offset + 5 * Math.sin((2 * Math.PI * t) / 600_000 + phase)
        return { name: this.name, value: numberValue(Math.round(value * 1000) / 1000), timestamp }
      }
    }
  }

  async close(): Promise<void> {
    clearTimeout(this.timer)
    this.timer = undefined
  }
}

export const simProvider: SourceProvider = {
  name: 'sim',
  describe: 'in-process simulated PVs (suffix :counter, :datetime, :uptime, :fail; otherwise a slow wave)',
  createSources(pvs: readonly PVName[], ctx: SourceContext): ValueSource[] {
    const connectDelayMs = readNumberOption(ctx.options, 'connectDelayMs')
    return pvs.map(pv => new SimSource(pv, { connectDelayMs }))
  },
}

export default simProvider
