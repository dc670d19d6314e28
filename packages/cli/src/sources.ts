import type { SourceProvider } from '@pvrec/source-types'

// always available
import { simProvider } from '@pvrec/source-sim'

function isProvider(v: unknown): v is SourceProvider {
  return typeof v === 'object' && v !== null
    && 'name' in v && typeof v.name === 'string'
    && 'createSources' in v && typeof v.createSources === 'function'
}

/** Network providers pull in heavy client libraries; load them only when listed or picked */
async function tryImportProvider(load: () => Promise<unknown>, id: string): Promise<SourceProvider | null> {
  try {
    const mod = await load()
    if (typeof mod === 'object' && mod !== null && 'default' in mod && isProvider(mod.default)) {
      return mod.default
    }
    return null
  } catch (e) {
    if (process.env.PVREC_DEBUG) {
      console.warn(`[sources] failed to import ${id}:`, e instanceof Error ? e.message : String(e))
    }
    return null
  }
}

/** Registry is built asynchronously once */
let REGISTRY_PROMISE: Promise<Map<string, SourceProvider>> | null = null

async function buildRegistry(): Promise<Map<string, SourceProvider>> {
  const reg = new Map<string, SourceProvider>([
    ['sim', simProvider],
  ])

  const opcua = await tryImportProvider(() => import('@pvrec/source-opcua'), '@pvrec/source-opcua')
  if (opcua) reg.set(opcua.name, opcua)

  return reg
}

async function getRegistry(): Promise<Map<string, SourceProvider>> {
  if (!REGISTRY_PROMISE) REGISTRY_PROMISE = buildRegistry()
  return REGISTRY_PROMISE
}

export async function listSources(): Promise<SourceProvider[]> {
  const reg = await getRegistry()
  return Array.from(reg.values()).sort((a, b) => a.name.localeCompare(b.name))
}

export class UnknownSourceError extends Error {
  constructor(readonly source: string, readonly available: string[]) {
    super(`Unknown source "${source}". Available: ${available.join(', ')}`)
    this.name = 'UnknownSourceError'
  }
}

export async function pickSource(name: string): Promise<SourceProvider> {
  const reg = await getRegistry()
  const key = name.toLowerCase()
  const p = reg.get(key)
  if (!p) {
    const available = (await listSources()).map(s => s.name)
    throw new UnknownSourceError(key, available)
  }
  return p
}
