import type { PVName, ReadingValue, RecorderLogger, ValueSource } from '@pvrec/core'

/**
 * What the CLI hands a provider when building the sources of a run.
 */
export interface SourceContext {
  /** Connection target for network providers (e.g. `opc.tcp://host:4840`) */
  endpoint?: string
  logger?: RecorderLogger
  /** Provider-specific knobs; providers validate what they read */
  options?: Record<string, unknown>
}

/**
 * Minimal provider contract: a name for the registry and a factory that returns one
 * source per PV, in the order given. Providers that share a connection between PVs
 * set it up here.
 */
export interface SourceProvider {
  name: string
  describe: string
  createSources(pvs: readonly PVName[], ctx: SourceContext): ValueSource[]
}

export const numberValue = (value: number): ReadingValue => ({ kind: 'number', value })
export const textValue = (value: string): ReadingValue => ({ kind: 'text', value })
export const errorValue = (reason: string): ReadingValue => ({ kind: 'error', reason })

/**
 * Map whatever a client library hands back onto a ReadingValue without losing its kind.
 * Booleans become 1/0 so the column stays numeric.
 */
export function toReadingValue(raw: unknown): ReadingValue {
  if (raw === null || raw === undefined) return errorValue('no value')
  if (typeof raw === 'number') return numberValue(raw)
  if (typeof raw === 'bigint') return textValue(raw.toString())
  if (typeof raw === 'boolean') return numberValue(raw ? 1 : 0)
  if (typeof raw === 'string') return textValue(raw)
  if (raw instanceof Date) return textValue(raw.toISOString())
  // localized text and similar wrappers
  if (typeof raw === 'object' && 'text' in raw && typeof raw.text === 'string') return textValue(raw.text)
  if (Array.isArray(raw)) return textValue(JSON.stringify(raw))
  return textValue(String(raw))
}

export function readNumberOption(options: Record<string, unknown> | undefined, key: string): number | undefined {
  const v = options?.[key]
  if (v === undefined) return undefined
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new TypeError(`option "${key}" must be a number`)
  return v
}
