import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors'

export const DEFAULT_PERIOD_S = 10
export const DEFAULT_DURATION_S = 60 * 60
export const DEFAULT_READ_TIMEOUT_S = 5
/** Cadence floor: shorter periods are raised to this */
export const MIN_PERIOD_S = 0.5
export const DEFAULT_EXTENSION = 'txt'
export const DEFAULT_PROGRAM = 'pvrec'
export const DEFAULT_BASE_DIR = path.join(os.homedir(), 'Documents', 'pvrec')

export const DerivedColumnId = z.enum(['local', 'iso'])
export type DerivedColumnId = z.infer<typeof DerivedColumnId>

const PvName = z
  .string()
  .refine(s => s.trim().length > 0, 'PV name must not be blank')
  .refine(s => !/[\t\r\n]/.test(s), 'PV name must not contain tabs or line breaks')

export const RecorderConfigSchema = z.object({
  pvs: z
    .array(PvName)
    .min(1, 'at least one PV name is required')
    .refine(list => new Set(list).size === list.length, 'PV names must be unique'),
  baseDir: z
    .string()
    .min(1, 'base directory must not be empty')
    .default(DEFAULT_BASE_DIR)
    .transform(p => path.resolve(p)),
  period: z
    .number()
    .positive('period must be > 0')
    .default(DEFAULT_PERIOD_S)
    .transform(p => Math.max(p, MIN_PERIOD_S)),
  duration: z.number().positive('duration must be > 0').default(DEFAULT_DURATION_S),
  extension: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'extension must be plain letters/digits (no dot or separator)')
    .default(DEFAULT_EXTENSION),
  derivedColumns: z.array(DerivedColumnId).default(['local']),
  program: z.string().min(1).default(DEFAULT_PROGRAM),
  connectTimeout: z.number().positive('connect timeout must be > 0').optional(),
  readTimeout: z.number().positive('read timeout must be > 0').default(DEFAULT_READ_TIMEOUT_S),
})

export type RecorderConfigInput = z.input<typeof RecorderConfigSchema>
export type RecorderConfig = z.output<typeof RecorderConfigSchema>

/** Validate and fill defaults; every violation is reported at once. */
export function parseRecorderConfig(input: RecorderConfigInput): RecorderConfig {
  const res = RecorderConfigSchema.safeParse(input)
  if (!res.success) {
    const issues = res.error.issues.map(i => {
      const where = i.path.join('.')
      return where ? `${where}: ${i.message}` : i.message
    })
    throw new ConfigurationError(issues)
  }
  return res.data
}
