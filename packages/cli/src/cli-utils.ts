import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { bold, cyan, dim, green, red, yellow } from 'colorette'
import type { RecorderLogger, RunOutcome } from '@pvrec/core'

/** ────────────────────────────────────────────────────────────────────────────
 *  FS helpers
 *  ──────────────────────────────────────────────────────────────────────────── */

/** Resolve a (possibly relative) path against repo root */
export function resolveRepoPath(repoRoot: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(repoRoot, p)
}

/** Make file:// link for pretty output */
export const linkifyFile = (absPath: string) => pathToFileURL(absPath).href

/** ────────────────────────────────────────────────────────────────────────────
 *  Repo root detection
 *  ────────────────────────────────────────────────────────────────────────────
 *  Rules:
 *   - If PVREC_REPO_ROOT is set and exists → use it
 *   - Else walk up from `start` until you find .git or .pvrecrc.json
 *   - If not found, fall back to `start`
 */
export function findRepoRoot(start = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
  const envRoot = env.PVREC_REPO_ROOT
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot)
  }

  let dir = path.resolve(start)
  while (true) {
    const isGitRoot = fs.existsSync(path.join(dir, '.git'))
    const hasRc = fs.existsSync(path.join(dir, '.pvrecrc.json'))
    if (isGitRoot || hasRc) return dir

    const parent = path.dirname(dir)
    if (parent === dir) {
      // reached FS root
      return path.resolve(start)
    }
    dir = parent
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Pretty console helpers
 *  ──────────────────────────────────────────────────────────────────────────── */
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** HH:MM:SS in local time, for log line prefixes */
export function clockStamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, '0')
  return `${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`
}

/**
 * RecorderLogger on top of the console helpers.
 * 0 → warn/error only, 1 (-v) → + info, 2 (-vv) → + debug
 */
export function createConsoleLogger(verbosity: number, now: () => Date = () => new Date()): RecorderLogger {
  const stamp = () => dim(clockStamp(now())) + ' '
  return {
    debug: msg => {
      if (verbosity >= 2) console.log(stamp() + dim('· ' + msg))
    },
    info: msg => {
      if (verbosity >= 1) info(stamp() + msg)
    },
    warn: msg => warn(stamp() + msg),
    error: msg => fail(stamp() + msg),
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Exit policy
 *  ──────────────────────────────────────────────────────────────────────────── */
export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_USAGE = 2
export const EXIT_INTERRUPTED = 130

export function exitCodeFor(outcome: Pick<RunOutcome, 'reason'>): number {
  switch (outcome.reason) {
    case 'completed': return EXIT_OK
    case 'cancelled': return EXIT_INTERRUPTED
    case 'failed':    return EXIT_FAILED
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Unified summaries
 *  ──────────────────────────────────────────────────────────────────────────── */

/** Seconds → "1h 02m 03s" / "2m 05s" / "4.5s" */
export function formatElapsed(ms: number): string {
  const s = ms / 1000
  if (s < 60) return `${Number(s.toFixed(1))}s`
  const total = Math.round(s)
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const sec = String(total % 60).padStart(2, '0')
  if (h === 0) return `${m}m ${sec}s`
  return `${h}h ${String(m).padStart(2, '0')}m ${sec}s`
}

/** Print nice summary for a recording run */
export function printRunSummary(args: {
  sourceLabel: string
  pvs: readonly string[]
  outcome: RunOutcome
}) {
  const { sourceLabel, pvs, outcome } = args
  const colored =
    outcome.reason === 'completed' ? green('completed')
    : outcome.reason === 'cancelled' ? yellow('cancelled')
    : red('failed')

  console.log('')
  console.log(bold('Recording summary'))
  console.log('  ' + cyan('source:   ') + sourceLabel)
  console.log('  ' + cyan('pvs:      ') + pvs.join(', '))
  console.log('  ' + cyan('rows:     ') + `${outcome.rowsWritten} ` + dim(`(skipped cycles ${outcome.cyclesSkipped})`))
  if (outcome.startedAt) {
    console.log('  ' + cyan('elapsed:  ') + formatElapsed(outcome.stoppedAt.getTime() - outcome.startedAt.getTime()))
  }
  if (outcome.lastFile) {
    console.log('  ' + cyan('file:     ') + `${outcome.lastFile} ${cyan('→')} ${dim(linkifyFile(outcome.lastFile))}`)
  }
  console.log('  ' + cyan('outcome:  ') + colored + (outcome.error ? dim(` (${outcome.error.message})`) : ''))
  console.log('  ' + cyan('exit:     ') + String(exitCodeFor(outcome)))
}
