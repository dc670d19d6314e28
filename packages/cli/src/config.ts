import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import {
  ConfigurationError,
  DEFAULT_BASE_DIR,
  DerivedColumnId,
  type RecorderConfigInput,
} from '@pvrec/core'
import { findRepoRoot, resolveRepoPath, warn } from './cli-utils'

export const RC_FILE = '.pvrecrc.json'
export const DEFAULT_SOURCE = 'sim'

/** Shape of `.pvrecrc.json`; env and CLI flags are mapped onto the same keys */
export const PvrecRcSchema = z
  .object({
    /** default PV list when none is given on the command line */
    pvs: z.array(z.string()).optional(),
    /** base directory of the daily files */
    path: z.string().optional(),
    period: z.number().optional(),
    duration: z.number().optional(),
    source: z.string().optional(),
    endpoint: z.string().optional(),
    extension: z.string().optional(),
    derivedColumns: z.array(DerivedColumnId).optional(),
    connectTimeout: z.number().optional(),
    readTimeout: z.number().optional(),
    verbose: z.number().int().min(0).optional(),
    /** passed untouched to the source provider */
    sourceOptions: z.record(z.unknown()).optional(),
  })
  .strict()

export type PvrecRc = z.infer<typeof PvrecRcSchema>

export interface ResolvedConfig {
  repoRoot: string
  rcPath: string | null
  source: string
  endpoint?: string
  verbose: number
  sourceOptions: Record<string, unknown>
  recorder: RecorderConfigInput
}

export interface LoadConfigOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

function validateLayer(label: string, data: unknown): PvrecRc {
  const res = PvrecRcSchema.safeParse(data)
  if (!res.success) {
    throw new ConfigurationError(
      res.error.issues.map(i => {
        const where = i.path.join('.')
        return `${label}: ${where ? `${where}: ` : ''}${i.message}`
      }),
    )
  }
  return res.data
}

/** Later layers win; undefined never overrides a defined value */
export function mergeLayers(...layers: PvrecRc[]): PvrecRc {
  const out: PvrecRc = {}
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(out, { [key]: value })
    }
  }
  return out
}

/** Walk up from start (not past repo root) and find nearest .pvrecrc.json */
export function findRc(startDir: string, repoRoot: string): string | null {
  let dir = path.resolve(startDir)

  while (true) {
    const candidate = path.join(dir, RC_FILE)
    if (fs.existsSync(candidate)) return candidate

    const parent = path.dirname(dir)
    if (parent === dir) break
    if (dir === repoRoot) break
    dir = parent
  }

  const fallback = path.join(repoRoot, RC_FILE)
  return fs.existsSync(fallback) ? fallback : null
}

function loadRcFromDisk(rcPath: string | null): PvrecRc {
  if (!rcPath) return {}
  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(rcPath, 'utf8'))
  } catch {
    warn(`[config] unreadable ${RC_FILE} at ${rcPath}, ignored`)
    return {}
  }
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    warn(`[config] invalid ${RC_FILE} at ${rcPath}, ignored`)
    return {}
  }
  return validateLayer(rcPath, data)
}

function envNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

function envString(raw: string | undefined): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw
}

export function envAsRc(env: NodeJS.ProcessEnv): PvrecRc {
  return validateLayer('PVREC_* environment', {
    path: envString(env.PVREC_PATH),
    period: envNumber(env.PVREC_PERIOD),
    duration: envNumber(env.PVREC_DURATION),
    source: envString(env.PVREC_SOURCE),
    endpoint: envString(env.PVREC_ENDPOINT),
    extension: envString(env.PVREC_EXTENSION),
    connectTimeout: envNumber(env.PVREC_CONNECT_TIMEOUT),
    readTimeout: envNumber(env.PVREC_READ_TIMEOUT),
    verbose: envNumber(env.PVREC_VERBOSE),
  })
}

/** Load and merge: defaults <- rc(file) <- env <- cli(partial) */
export function loadConfig(cliOverrides: PvrecRc = {}, opts: LoadConfigOptions = {}): ResolvedConfig {
  const env = opts.env ?? process.env
  const cwd = opts.cwd ?? process.cwd()
  const repoRoot = findRepoRoot(cwd, env)
  const rcPath = findRc(cwd, repoRoot)

  const merged = mergeLayers(
    { source: DEFAULT_SOURCE, verbose: 0 },
    loadRcFromDisk(rcPath),
    envAsRc(env),
    validateLayer('command line', cliOverrides),
  )

  return {
    repoRoot,
    rcPath,
    source: (merged.source ?? DEFAULT_SOURCE).toLowerCase(),
    endpoint: merged.endpoint,
    verbose: merged.verbose ?? 0,
    sourceOptions: merged.sourceOptions ?? {},
    recorder: {
      pvs: merged.pvs ?? [],
      baseDir: merged.path ? resolveRepoPath(repoRoot, merged.path) : DEFAULT_BASE_DIR,
      period: merged.period,
      duration: merged.duration,
      extension: merged.extension,
      derivedColumns: merged.derivedColumns,
      connectTimeout: merged.connectTimeout,
      readTimeout: merged.readTimeout,
    },
  }
}
