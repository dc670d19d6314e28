import path from 'node:path'
import type { DerivedColumnId } from '../config'
import type { PVName, ReadingValue, Sample } from '../types'

export const COLUMN_SEPARATOR = '\t'
export const TIME_COLUMN = 'time'

/** Extra human-readable column appended after the PV values */
export interface DerivedColumn {
  id: DerivedColumnId
  title: string
  render(capturedAt: Date): string
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0')

/** Capture instant in the process's local time: `YYYY-MM-DD HH:MM:SS.mmm` */
export function formatLocalTime(d: Date): string {
  const date = `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`
  return `${date} ${time}`
}

export const DERIVED_COLUMNS: Record<DerivedColumnId, DerivedColumn> = {
  local: { id: 'local', title: 'ymd hms', render: formatLocalTime },
  iso: { id: 'iso', title: 'iso8601', render: d => d.toISOString() },
}

export function resolveDerivedColumns(ids: readonly DerivedColumnId[]): DerivedColumn[] {
  return ids.map(id => DERIVED_COLUMNS[id])
}

/** `<base>/<YYYY>/<MM>/<YYYY>-<MM>-<DD>.<ext>`, always from the UTC calendar date */
export function dailyFilePath(baseDir: string, when: Date, extension: string): string {
  const y = pad(when.getUTCFullYear(), 4)
  const m = pad(when.getUTCMonth() + 1)
  const d = pad(when.getUTCDate())
  return path.join(baseDir, y, m, `${y}-${m}-${d}.${extension}`)
}

/** Seconds since the epoch, two decimals */
export function formatEpoch(d: Date): string {
  return (d.getTime() / 1000).toFixed(2)
}

/** Tabs and line breaks would split a row; each run of them becomes one space. */
export function sanitizeCell(s: string): string {
  return s.replace(/[\t\r\n]+/g, ' ')
}

export function renderValue(v: ReadingValue): string {
  switch (v.kind) {
    case 'number': return String(v.value)
    case 'text':   return sanitizeCell(v.value)
    case 'error':  return `ERR:${sanitizeCell(v.reason)}`
  }
}

export interface HeaderInfo {
  file: string
  createdAt: Date
  program: string
  pvs: readonly PVName[]
  derived: readonly DerivedColumn[]
}

export function formatHeader(h: HeaderInfo): string {
  const titles = [TIME_COLUMN, ...h.pvs, ...h.derived.map(c => c.title)]
  return [
    `# file: ${h.file}`,
    `# created: ${h.createdAt.toISOString()}`,
    `# program: ${h.program}`,
    '# column separator: tab',
    '#',
    '# time: (UTC) seconds since 1970-01-01T00:00:00 UTC',
    '#',
    titles.join(COLUMN_SEPARATOR),
  ].join('\n') + '\n'
}

export function formatRow(sample: Sample, derived: readonly DerivedColumn[]): string {
  const cells = [
    formatEpoch(sample.capturedAt),
    ...sample.readings.map(r => renderValue(r.value)),
    ...derived.map(c => c.render(sample.capturedAt)),
  ]
  return cells.join(COLUMN_SEPARATOR) + '\n'
}
