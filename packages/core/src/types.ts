export type PVName = string

/**
 * A value as delivered by its source. Sources disagree on shape (a temperature is a
 * number, an uptime is a duration string), so the value keeps its own kind all the way
 * to the log file.
 */
export type ReadingValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'error'; reason: string }

export interface Reading {
  name: PVName
  value: ReadingValue
  /** Time reported by the source for this value (not the sampling instant) */
  timestamp: Date
}

/**
 * One row of the log: a reading per PV in group order, plus the wall-clock instant the
 * row was captured.
 */
export interface Sample {
  capturedAt: Date
  readings: Reading[]
}

/**
 * Minimal per-PV contract. Implementations live in the source packages
 * (simulator, OPC UA, ...); the engine only ever talks to this shape.
 */
export interface ValueSource {
  readonly name: PVName
  /** Request a connection. Resolves once the request is issued, not when ready. */
  connect(): Promise<void>
  isReady(): boolean
  /** Resolves when ready; rejects with the signal's reason if aborted first. */
  waitUntilReady(signal?: AbortSignal): Promise<void>
  read(): Promise<Reading>
  close?(): Promise<void>
}

export type RunState = 'idle' | 'connecting' | 'running' | 'stopped'

export type StopReason = 'completed' | 'cancelled' | 'failed'

export interface RunOutcome {
  reason: StopReason
  rowsWritten: number
  cyclesSkipped: number
  /** Instant the scheduler entered `running`; absent when it never got there */
  startedAt?: Date
  stoppedAt: Date
  /** Last file a row went to */
  lastFile?: string
  error?: Error
}

/**
 * Sink for progress and diagnostics. The engine never prints on its own; the CLI
 * decides what reaches the terminal.
 */
export interface RecorderLogger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export const silentLogger: RecorderLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

export interface Clock {
  now(): number
}

export const systemClock: Clock = { now: () => Date.now() }
