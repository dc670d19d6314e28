import 'dotenv/config'

import path from 'node:path'
import { Command, InvalidArgumentError } from 'commander'
import { bold, cyan, dim } from 'colorette'
import { config as loadEnv } from 'dotenv'
import { dailyFilePath, parseRecorderConfig } from '@pvrec/core'

import { fail, findRepoRoot } from './cli-utils'
import { loadConfig, type PvrecRc, type ResolvedConfig } from './config'
import { runRecordCLI } from './record'
import { listSources } from './sources'

// ────────────────────────────────────────────────────────────────────────────────
// Repo root (.git | .pvrecrc.json | fallback)
// ────────────────────────────────────────────────────────────────────────────────
const REPO_ROOT = findRepoRoot()

process.env.PVREC_REPO_ROOT ||= REPO_ROOT

loadEnv({ path: path.join(REPO_ROOT, '.env') })

function parseSeconds(raw: string): number {
  const n = Number(raw)
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('expected a positive number of seconds')
  return n
}

function increaseVerbosity(_raw: string, previous: number): number {
  return previous + 1
}

function parseDate(raw: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(raw)) throw new InvalidArgumentError('expected YYYY-MM-DD')
  const d = new Date(`${raw}T00:00:00Z`)
  if (Number.isNaN(d.getTime()) || d.toISOString().slice(0, 10) !== raw) {
    throw new InvalidArgumentError(`not a calendar date: ${raw}`)
  }
  return d
}

interface RecordFlags {
  path?: string
  period?: number
  duration?: number
  source?: string
  endpoint?: string
  ext?: string
  connectTimeout?: number
  readTimeout?: number
  verbose?: number
}

interface WhereFlags {
  path?: string
  date?: Date
  ext?: string
}

// ────────────────────────────────────────────────────────────────────────────────
const program = new Command()
  .name('pvrec')
  .description(`${bold('pvrec')}: sample process variables on a fixed cadence into daily log files`)
  .version('0.1.0')

program.showHelpAfterError()
program.showSuggestionAfterError()

// ────────────────────────────────────────────────────────────────────────────────
// record
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('record')
  .description('Record PVs until the duration elapses or SIGINT/SIGTERM')
  .argument('[pvnames...]', 'PV names, one column each (default: pvs from .pvrecrc.json)')
  .option('--path <dir>', 'base directory of the daily files (abs or repo-root relative)')
  .option('--period <s>', 'seconds between samples', parseSeconds)
  .option('--duration <s>', 'seconds to record', parseSeconds)
  .option('--source <name>', 'value source: sim|opcua')
  .option('--endpoint <url>', 'endpoint for network sources, e.g. opc.tcp://localhost:4840')
  .option('--ext <ext>', 'file extension without the dot')
  .option('--connect-timeout <s>', 'give up when PVs are not connected after this long', parseSeconds)
  .option('--read-timeout <s>', 'skip a cycle when a read takes longer', parseSeconds)
  .option('-v, --verbose', 'more output (-v info, -vv every row)', increaseVerbosity, 0)
  .action(async (pvnames: string[], opts: RecordFlags) => {
    const cli: PvrecRc = {
      pvs: pvnames.length ? pvnames : undefined,
      path: opts.path,
      period: opts.period,
      duration: opts.duration,
      source: opts.source,
      endpoint: opts.endpoint,
      extension: opts.ext,
      connectTimeout: opts.connectTimeout,
      readTimeout: opts.readTimeout,
      verbose: opts.verbose || undefined,
    }

    let config: ResolvedConfig
    try {
      config = loadConfig(cli)
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e))
      process.exit(2)
    }

    const { exitCode } = await runRecordCLI({ config })
    process.exit(exitCode)
  })

// ────────────────────────────────────────────────────────────────────────────────
// where
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('where')
  .description('Print the daily file a recording would write to')
  .option('--path <dir>', 'base directory (abs or repo-root relative)')
  .option('--date <YYYY-MM-DD>', 'UTC day (default: today)', parseDate)
  .option('--ext <ext>', 'file extension without the dot')
  .action((opts: WhereFlags) => {
    try {
      const rc = loadConfig({ path: opts.path, extension: opts.ext })
      // pvs only matter for recording; validate the rest
      const cfg = parseRecorderConfig({ ...rc.recorder, pvs: ['-'] })
      console.log(dailyFilePath(cfg.baseDir, opts.date ?? new Date(), cfg.extension))
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e))
      process.exit(2)
    }
  })

// ────────────────────────────────────────────────────────────────────────────────
// sources
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('sources')
  .description('List value-source providers')
  .action(async () => {
    for (const s of await listSources()) {
      console.log(`  ${cyan(s.name.padEnd(8))} ${s.describe}`)
    }
  })

// help footer
program.addHelpText(
  'afterAll',
  `
${dim('Config sources (priority high→low):')} CLI ${bold('>')} ENV ${bold('>')} .pvrecrc.json ${bold('>')} defaults
Repo root: ${dim(REPO_ROOT)}
`,
)

// run
program.parseAsync().catch((e: unknown) => {
  fail(e instanceof Error ? String(e.stack ?? e) : String(e))
  process.exit(1)
})
