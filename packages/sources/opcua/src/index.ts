import { setTimeout as delay } from 'node:timers/promises'
import {
  AttributeIds,
  OPCUAClient,
  type ClientSession,
  type DataValue,
} from 'node-opcua-client'
import { errorMessage, silentLogger, type PVName, type Reading, type RecorderLogger, type ValueSource } from '@pvrec/core'
import {
  ReadinessLatch,
  errorValue,
  readNumberOption,
  toReadingValue,
  type SourceContext,
  type SourceProvider,
} from '@pvrec/source-types'

const DEFAULT_POLL_INTERVAL_MS = 1000

/**
 * One client + session per endpoint, shared by every PV of the run. Opened on first use,
 * closed when the last source lets go.
 */
export class OpcuaEndpoint {
  private client: OPCUAClient | null = null
  private current: ClientSession | null = null
  private opening: Promise<ClientSession> | null = null
  private users = 0

  constructor(readonly url: string, private readonly logger: RecorderLogger = silentLogger) {}

  acquire(): void {
    this.users++
  }

  session(): Promise<ClientSession> {
    this.opening ??= this.open()
    return this.opening
  }

  async read(nodeId: string): Promise<DataValue> {
    const session = await this.session()
    return session.read({ nodeId, attributeId: AttributeIds.Value })
  }

  async release(): Promise<void> {
    this.users = Math.max(0, this.users - 1)
    if (this.users > 0) return
    const { client, current } = this
    this.opening = null
    this.client = null
    this.current = null
    if (current) await current.close()
    // also cancels a connect that is still retrying
    if (client) {
      await client.disconnect()
      this.logger.debug(`disconnected from ${this.url}`)
    }
  }

  private async open(): Promise<ClientSession> {
    const client = OPCUAClient.create({
      applicationName: 'pvrec',
      endpointMustExist: false,
    })
    this.client = client
    try {
      this.logger.debug(`connecting to ${this.url}`)
      await client.connect(this.url)
      const session = await client.createSession()
      if (this.client !== client) {
        // released while connecting
        await session.close()
        throw new Error(`endpoint ${this.url} was released`)
      }
      this.current = session
      this.logger.info(`session open on ${this.url}`)
      return session
    } catch (e) {
      if (this.client === client) {
        // let the next caller try again on a fresh client
        this.opening = null
        this.client = null
        await client.disconnect().catch((err: unknown) => {
          this.logger.debug(`disconnect after failed connect to ${this.url}: ${errorMessage(err)}`)
        })
      }
      throw e
    }
  }
}

export interface OpcuaSourceOptions {
  pollIntervalMs?: number
  logger?: RecorderLogger
}

/**
 * A PV is one NodeId (`ns=2;s=Temperature`). It is ready once a first read of its
 * Value attribute comes back Good; until then it keeps polling.
 */
export class OpcuaSource implements ValueSource {
  private readonly latch = new ReadinessLatch()
  private readonly stopPolling = new AbortController()
  private readonly pollIntervalMs: number
  private readonly logger: RecorderLogger
  private polling: Promise<void> | null = null
  private closed = false

  constructor(readonly name: PVName, private readonly endpoint: OpcuaEndpoint, opts: OpcuaSourceOptions = {}) {
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.logger = opts.logger ?? silentLogger
    endpoint.acquire()
  }

  async connect(): Promise<void> {
    this.polling ??= this.pollReadiness().catch(e => {
      this.logger.warn(`${this.name}: readiness polling stopped: ${errorMessage(e)}`)
    })
  }

  isReady(): boolean {
    return this.latch.isSet
  }

  waitUntilReady(signal?: AbortSignal): Promise<void> {
    return this.latch.wait(signal)
  }

  async read(): Promise<Reading> {
    if (!this.latch.isSet) throw new Error(`${this.name} is not connected`)
    const dv = await this.endpoint.read(this.name)
    const timestamp = dv.sourceTimestamp ?? dv.serverTimestamp ?? new Date()
    const value = dv.statusCode.isGood()
      ? toReadingValue(dv.value.value)
      : errorValue(dv.statusCode.name)
    return { name: this.name, value, timestamp }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.stopPolling.abort()
    await this.endpoint.release()
  }

  private async pollReadiness(): Promise<void> {
    const signal = this.stopPolling.signal
    while (!signal.aborted) {
      try {
        const dv = await this.endpoint.read(this.name)
        if (dv.statusCode.isGood()) {
          this.latch.set()
          return
        }
        this.logger.debug(`${this.name}: ${dv.statusCode.name}, retrying`)
      } catch (e) {
        this.logger.debug(`${this.name}: ${errorMessage(e)}, retrying`)
      }
      try {
        await delay(this.pollIntervalMs, undefined, { signal })
      } catch {
        return
      }
    }
  }
}

export const opcuaProvider: SourceProvider = {
  name: 'opcua',
  describe: 'OPC UA server; each PV is a NodeId read from --endpoint',
  createSources(pvs: readonly PVName[], ctx: SourceContext): ValueSource[] {
    if (!ctx.endpoint) {
      throw new Error('the opcua source needs an endpoint (e.g. --endpoint opc.tcp://localhost:4840)')
    }
    const endpoint = new OpcuaEndpoint(ctx.endpoint, ctx.logger)
    const pollIntervalMs = readNumberOption(ctx.options, 'pollIntervalMs')
    return pvs.map(pv => new OpcuaSource(pv, endpoint, { pollIntervalMs, logger: ctx.logger }))
  },
}

export default opcuaProvider
