import { parseRecorderConfig, type RecorderConfig, type RecorderConfigInput } from './config'
import { ConfigurationError } from './errors'
import { SourceGroup } from './group'
import { SamplingScheduler, systemTimer, type Timer } from './scheduler'
import type { RecorderLogger, RunOutcome, RunState, ValueSource } from './types'
import { RotatingLogWriter } from './writer/rotating'

export interface RecordingDeps {
  /** One source per configured PV, in the same order */
  sources: readonly ValueSource[]
  logger?: RecorderLogger
  timer?: Timer
}

export interface RecordingHandle {
  readonly config: RecorderConfig
  readonly state: RunState
  /** Daily file a sample captured at `when` goes to */
  pathFor(when: Date): string
  /** Settles once the run is `stopped`; never rejects */
  readonly done: Promise<RunOutcome>
  stop(): void
  isRunning(): boolean
}

/**
 * Validate the configuration, wire group, writer and scheduler, and start sampling.
 * Throws ConfigurationError synchronously; everything after that is reported through
 * `done`.
 */
export function startRecording(input: RecorderConfigInput, deps: RecordingDeps): RecordingHandle {
  const config = parseRecorderConfig(input)

  const names = deps.sources.map(s => s.name)
  if (names.length !== config.pvs.length || names.some((n, i) => n !== config.pvs[i])) {
    throw new ConfigurationError([
      `sources [${names.join(', ')}] do not match pvs [${config.pvs.join(', ')}]`,
    ])
  }

  const timer = deps.timer ?? systemTimer
  const group = new SourceGroup(deps.sources, {
    logger: deps.logger,
    connectTimeout: config.connectTimeout,
    readTimeout: config.readTimeout,
  })
  const writer = new RotatingLogWriter({
    baseDir: config.baseDir,
    pvs: config.pvs,
    extension: config.extension,
    derivedColumns: config.derivedColumns,
    program: config.program,
    logger: deps.logger,
    clock: timer,
  })
  const scheduler = new SamplingScheduler({
    period: config.period,
    duration: config.duration,
    group,
    writer,
    logger: deps.logger,
    timer,
  })

  const done = scheduler.run()

  return {
    config,
    get state() { return scheduler.state },
    pathFor: when => writer.pathFor(when),
    done,
    stop: () => scheduler.stop(),
    isRunning: () => scheduler.isRunning(),
  }
}

export function stopRecording(handle: RecordingHandle): void {
  handle.stop()
}

export function isRecording(handle: RecordingHandle): boolean {
  return handle.isRunning()
}
