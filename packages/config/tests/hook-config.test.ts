import { describe, it, expect } from 'vitest'
import {
  DEFAULT_STATUS_DIR,
  HookConfigSchema,
  SinkConfigSchema,
  loadDefaultConfig,
} from '../src/index.js'

describe('SinkConfigSchema', () => {
  it('validates a file sink', () => {
    const result = SinkConfigSchema.safeParse({ type: 'file' })
    expect(result.success).toBe(true)
  })

  it('validates a process sink with a script', () => {
    const result = SinkConfigSchema.safeParse({
      type: 'process',
      command: 'python3',
      script: '/usr/libexec/evpn/df-changed.py',
    })
    expect(result.success).toBe(true)
  })

  it('rejects a process sink without a command', () => {
    const result = SinkConfigSchema.safeParse({ type: 'process' })
    expect(result.success).toBe(false)
  })

  it('rejects a process sink with an empty command', () => {
    const result = SinkConfigSchema.safeParse({ type: 'process', command: '' })
    expect(result.success).toBe(false)
  })

  it('rejects an unknown sink type', () => {
    const result = SinkConfigSchema.safeParse({ type: 'socket' })
    expect(result.success).toBe(false)
  })
})

describe('HookConfigSchema', () => {
  it('applies defaults to an empty object', () => {
    const config = HookConfigSchema.parse({})
    expect(config).toEqual({
      baseDir: DEFAULT_STATUS_DIR,
      sink: { type: 'file' },
      logLevel: 'info',
    })
  })

  it('rejects an empty base directory', () => {
    const result = HookConfigSchema.safeParse({ baseDir: '' })
    expect(result.success).toBe(false)
  })

  it('rejects an unknown log level', () => {
    const result = HookConfigSchema.safeParse({ logLevel: 'verbose' })
    expect(result.success).toBe(false)
  })
})

describe('loadDefaultConfig', () => {
  it('returns defaults when no variables are set', () => {
    expect(loadDefaultConfig({})).toEqual({
      baseDir: '/run/frr/evpn-mh',
      sink: { type: 'file' },
      logLevel: 'info',
    })
  })

  it('reads the status directory and log level', () => {
    const config = loadDefaultConfig({
      EVPN_MH_STATUS_DIR: '/tmp/evpn',
      LOG_LEVEL: 'debug',
    })
    expect(config.baseDir).toBe('/tmp/evpn')
    expect(config.logLevel).toBe('debug')
  })

  it('builds a process sink from helper variables', () => {
    const config = loadDefaultConfig({
      EVPN_MH_SINK: 'process',
      EVPN_MH_HELPER_COMMAND: 'python3',
      EVPN_MH_HELPER_SCRIPT: '/usr/libexec/evpn/df-changed.py',
    })
    expect(config.sink).toEqual({
      type: 'process',
      command: 'python3',
      script: '/usr/libexec/evpn/df-changed.py',
    })
  })

  it('throws when the process sink has no helper command', () => {
    expect(() => loadDefaultConfig({ EVPN_MH_SINK: 'process' })).toThrow()
  })

  it('throws on an unknown sink type', () => {
    expect(() => loadDefaultConfig({ EVPN_MH_SINK: 'carrier-pigeon' })).toThrow()
  })
})
