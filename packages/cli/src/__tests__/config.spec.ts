import path from 'node:path'
import { describe, it, beforeEach, afterEach, expect } from 'vitest'
import { ConfigurationError, DEFAULT_BASE_DIR } from '@pvrec/core'
import { findRc, loadConfig, mergeLayers, type PvrecRc } from '../config'
import { captureConsole, makeSandbox, type Sandbox } from './helpers/sandbox'

describe('config.loadConfig (with sandbox)', () => {
  let sbx: Sandbox

  beforeEach(() => {
    sbx = makeSandbox('pvrec-config-')
  })

  afterEach(() => {
    sbx.cleanup()
  })

  const load = (cli: PvrecRc = {}, env: NodeJS.ProcessEnv = {}, cwd = sbx.root) =>
    loadConfig(cli, { cwd, env: { ...sbx.env, ...env } })

  it('returns defaults when no rc and no env', () => {
    const cfg = load()
    expect(cfg.repoRoot).toBe(sbx.root)
    expect(cfg.rcPath).toBeNull()
    expect(cfg.source).toBe('sim')
    expect(cfg.verbose).toBe(0)
    expect(cfg.endpoint).toBeUndefined()
    expect(cfg.sourceOptions).toEqual({})
    expect(cfg.recorder).toEqual({
      pvs: [],
      baseDir: DEFAULT_BASE_DIR,
      period: undefined,
      duration: undefined,
      extension: undefined,
      derivedColumns: undefined,
      connectTimeout: undefined,
      readTimeout: undefined,
    })
  })

  it('merges rc from repo root and resolves path against it', () => {
    sbx.writeRc(sbx.root, {
      pvs: ['a', 'b'],
      path: 'logs',
      period: 5,
      source: 'OPCUA',
      endpoint: 'opc.tcp://plc:4840',
      derivedColumns: ['local', 'iso'],
      sourceOptions: { pollIntervalMs: 50 },
    })

    const cfg = load()
    expect(cfg.rcPath).toBe(path.join(sbx.root, '.pvrecrc.json'))
    expect(cfg.source).toBe('opcua')
    expect(cfg.endpoint).toBe('opc.tcp://plc:4840')
    expect(cfg.sourceOptions).toEqual({ pollIntervalMs: 50 })
    expect(cfg.recorder.pvs).toEqual(['a', 'b'])
    expect(cfg.recorder.baseDir).toBe(path.join(sbx.root, 'logs'))
    expect(cfg.recorder.period).toBe(5)
    expect(cfg.recorder.derivedColumns).toEqual(['local', 'iso'])
  })

  it('prefers the nearest rc walking up from cwd', () => {
    sbx.writeRc(sbx.root, { period: 5 })
    const nested = path.join(sbx.root, 'site', 'hall')
    const nearest = sbx.writeRc(path.join(sbx.root, 'site'), { period: 2 })
    sbx.writeRc(nested, {})

    expect(findRc(path.join(sbx.root, 'site'), sbx.root)).toBe(nearest)
    expect(load({}, {}, path.join(sbx.root, 'site')).recorder.period).toBe(2)
  })

  it('env overrides rc, cli overrides env', () => {
    sbx.writeRc(sbx.root, { period: 5, duration: 60, extension: 'log' })

    const cfg = load(
      { duration: 30 },
      { PVREC_PERIOD: '2', PVREC_DURATION: '120', PVREC_PATH: '/data/pv', PVREC_VERBOSE: '1' },
    )
    expect(cfg.recorder.period).toBe(2)
    expect(cfg.recorder.duration).toBe(30)
    expect(cfg.recorder.extension).toBe('log')
    expect(cfg.recorder.baseDir).toBe('/data/pv')
    expect(cfg.verbose).toBe(1)
  })

  it('undefined cli values do not override', () => {
    sbx.writeRc(sbx.root, { pvs: ['rc:pv'], source: 'sim', readTimeout: 3 })
    const cfg = load({ pvs: undefined, source: undefined, readTimeout: undefined })
    expect(cfg.recorder.pvs).toEqual(['rc:pv'])
    expect(cfg.recorder.readTimeout).toBe(3)
  })

  it('empty env strings are ignored', () => {
    const cfg = load({}, { PVREC_SOURCE: '', PVREC_PERIOD: ' ' })
    expect(cfg.source).toBe('sim')
    expect(cfg.recorder.period).toBeUndefined()
  })

  it('rejects a non-numeric env value', () => {
    expect(() => load({}, { PVREC_PERIOD: 'soon' })).toThrow(ConfigurationError)
    try {
      load({}, { PVREC_PERIOD: 'soon' })
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e
      expect(e.issues).toHaveLength(1)
      expect(e.issues[0]).toMatch(/^PVREC_\* environment: period: /)
    }
  })

  it('rejects unknown rc keys', () => {
    const rcPath = sbx.writeRc(sbx.root, { perod: 5 })
    expect(() => load()).toThrow(ConfigurationError)
    try {
      load()
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e
      expect(e.issues[0]?.startsWith(`${rcPath}: `)).toBe(true)
    }
  })

  it('warns about and ignores an unparsable rc', () => {
    sbx.writeRc(sbx.root, '{ not json')
    const cap = captureConsole()
    const cfg = load()
    cap.restore()
    expect(cfg.recorder.period).toBeUndefined()
    expect(cap.err).toEqual([`▲ [config] unreadable .pvrecrc.json at ${path.join(sbx.root, '.pvrecrc.json')}, ignored`])
  })
})

describe('mergeLayers', () => {
  it('later layers win, undefined never overrides', () => {
    expect(mergeLayers({ period: 1, source: 'sim' }, { period: undefined, duration: 9 }, { source: 'opcua' }))
      .toEqual({ period: 1, duration: 9, source: 'opcua' })
  })
})
