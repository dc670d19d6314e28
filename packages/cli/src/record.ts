import {
  ConfigurationError,
  errorMessage,
  startRecording,
  type RecorderLogger,
  type RecordingHandle,
  type RunOutcome,
  type Timer,
  type ValueSource,
} from '@pvrec/core'
import {
  EXIT_USAGE,
  createConsoleLogger,
  exitCodeFor,
  fail,
  printRunSummary,
  warn,
} from './cli-utils'
import type { ResolvedConfig } from './config'
import { UnknownSourceError, pickSource } from './sources'

export interface RecordCliOptions {
  config: ResolvedConfig
  logger?: RecorderLogger
  timer?: Timer
  /** Stop on SIGINT/SIGTERM (default true) */
  handleSignals?: boolean
  /** Called once the run has started; lets callers stop it */
  onStarted?: (handle: RecordingHandle) => void
  /** Print the run summary (default true) */
  summary?: boolean
}

export interface RecordCliResult {
  exitCode: number
  outcome?: RunOutcome
}

function reportUsageError(e: unknown): boolean {
  if (e instanceof ConfigurationError) {
    fail('Invalid configuration:')
    for (const issue of e.issues) console.error('   • ' + issue)
    return true
  }
  if (e instanceof UnknownSourceError) {
    fail(e.message)
    return true
  }
  return false
}

/**
 * Build the sources, start the recording and wait for it to end. Never throws for
 * problems a user can cause; those come back as an exit code.
 */
export async function runRecordCLI(opts: RecordCliOptions): Promise<RecordCliResult> {
  const { config } = opts
  const logger = opts.logger ?? createConsoleLogger(config.verbose)

  let handle: RecordingHandle
  try {
    const provider = await pickSource(config.source)
    let sources: ValueSource[]
    try {
      sources = provider.createSources(config.recorder.pvs, {
        endpoint: config.endpoint,
        logger,
        options: config.sourceOptions,
      })
    } catch (e) {
      throw new ConfigurationError([`source ${provider.name}: ${errorMessage(e)}`], { cause: e })
    }
    handle = startRecording(config.recorder, { sources, logger, timer: opts.timer })
  } catch (e) {
    if (reportUsageError(e)) return { exitCode: EXIT_USAGE }
    throw e
  }

  logger.info(`recording ${handle.config.pvs.length} PVs from ${config.source} every ${handle.config.period}s for ${handle.config.duration}s`)
  logger.info(`writing to ${handle.pathFor(new Date())}`)

  const onSignal = (sig: NodeJS.Signals) => {
    warn(`${sig} received, finishing the current cycle`)
    handle.stop()
  }
  const handleSignals = opts.handleSignals ?? true
  if (handleSignals) {
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  }

  opts.onStarted?.(handle)

  let outcome: RunOutcome
  try {
    outcome = await handle.done
  } finally {
    if (handleSignals) {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
    }
  }

  if (outcome.reason === 'failed' && outcome.error) {
    fail(outcome.error.message)
  }
  if (opts.summary ?? true) {
    printRunSummary({ sourceLabel: config.source, pvs: handle.config.pvs, outcome })
  }
  return { exitCode: exitCodeFor(outcome), outcome }
}
