import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { configureLogger, resetLogger } from '@evpn-mh/telemetry'
import {
  DfStatusHook,
  FileStatusSink,
  onRibProcessDplaneResults,
  resetDefaultHook,
} from '../src/index.js'
import type { HookState, PublishResult, StatusRecord, StatusSink } from '../src/index.js'

function recordingSink(result: PublishResult = { success: true }) {
  const records: StatusRecord[] = []
  const sink: StatusSink = {
    kind: 'file',
    publish: vi.fn((record: StatusRecord) => {
      records.push(record)
      return result
    }),
  }
  return { sink, records }
}

describe('DfStatusHook', () => {
  let dir: string
  let lines: string[]

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'evpn-df-hook-'))
    lines = []
    await configureLogger({
      level: 'debug',
      environment: 'production',
      write: (line) => lines.push(line),
    })
  })

  afterEach(async () => {
    rmSync(dir, { recursive: true, force: true })
    await resetLogger()
  })

  function errorMessages(): string[] {
    return lines
      .map((line) => JSON.parse(line) as { level: string; message: string })
      .filter((record) => record.level === 'error')
      .map((record) => record.message)
  }

  it('does nothing for an event without a bridge port', () => {
    const { sink } = recordingSink()
    const hook = new DfStatusHook({ sink })

    expect(hook.handle({ interfaceName: 'bond1' })).toEqual({})
    expect(hook.handle(undefined)).toEqual({})
    expect(sink.publish).not.toHaveBeenCalled()
    expect(hook.lastResult).toBeUndefined()
  })

  it('writes no file for an event without a bridge port', () => {
    const hook = new DfStatusHook({ sink: new FileStatusSink({ baseDir: dir }) })

    hook.handle({ interfaceName: 'bond1' })

    expect(readdirSync(dir)).toEqual([])
  })

  it('publishes one record per event', () => {
    const { sink, records } = recordingSink()
    const hook = new DfStatusHook({ sink })

    hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 3 } })

    expect(records).toEqual([{ interfaceName: 'bond1', status: 'non-df' }])
    expect(Object.isFrozen(records[0])).toBe(true)
  })

  it('publishes through the daemon field names', () => {
    const { sink, records } = recordingSink()
    const hook = new DfStatusHook({ sink })

    hook.handle({ zd_ifname: 'bond2', br_port: { flags: 0 } })

    expect(records).toEqual([{ interfaceName: 'bond2', status: 'df' }])
  })

  it('keeps only the last status for an interface', () => {
    const hook = new DfStatusHook({ sink: new FileStatusSink({ baseDir: dir }) })

    hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 1 } })
    hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 2 } })

    expect(readFileSync(join(dir, 'evpn_df_status_bond1.json'), 'utf8')).toBe(
      '{"interface":"bond1","df_status":"df"}\n'
    )
  })

  it('returns the empty result when the sink fails', () => {
    const hook = new DfStatusHook({
      sink: new FileStatusSink({ baseDir: join(dir, 'read-only') }),
    })

    const result = hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 1 } })

    expect(result).toEqual({})
    expect(hook.state).toBe('idle')
    expect(hook.lastResult?.success).toBe(false)
    if (hook.lastResult && !hook.lastResult.success) {
      expect(hook.lastResult.error.kind).toBe('io')
    }
  })

  it('contains a sink that throws', () => {
    const sink: StatusSink = {
      kind: 'process',
      publish: () => {
        throw new Error('sink exploded')
      },
    }
    const hook = new DfStatusHook({ sink })

    expect(hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 1 } })).toEqual({})
    expect(hook.state).toBe('idle')
    expect(errorMessages()).toEqual(['DF status hook failed: sink exploded'])
  })

  it('is processing while the sink runs', () => {
    const seen: HookState[] = []
    const sink: StatusSink = {
      kind: 'file',
      publish: () => {
        seen.push(hook.state)
        return { success: true }
      },
    }
    const hook = new DfStatusHook({ sink })

    expect(hook.state).toBe('idle')
    hook.handle({ interfaceName: 'bond1', bridgePort: {} })

    expect(seen).toEqual(['processing'])
    expect(hook.state).toBe('idle')
  })

  it('returns a fresh empty result on every call', () => {
    const { sink } = recordingSink()
    const hook = new DfStatusHook({ sink })

    const first = hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 1 } })
    const second = hook.handle({ interfaceName: 'bond1', bridgePort: { flags: 1 } })

    expect(first).toEqual({})
    expect(second).not.toBe(first)
  })

  it('builds a file sink from configuration', () => {
    const hook = DfStatusHook.fromConfig({ baseDir: dir, sink: { type: 'file' } })

    expect(hook.sink.kind).toBe('file')
    hook.handle({ interfaceName: 'eth0', bridgePort: { flags: 1 } })

    expect(readFileSync(join(dir, 'evpn_df_status_eth0.json'), 'utf8')).toBe(
      '{"interface":"eth0","df_status":"non-df"}\n'
    )
  })

  it('builds a process sink from configuration', () => {
    const hook = DfStatusHook.fromConfig({
      baseDir: dir,
      sink: { type: 'process', command: 'python3', script: '/opt/df.py' },
    })

    expect(hook.sink.kind).toBe('process')
  })
})

describe('onRibProcessDplaneResults', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'evpn-df-callback-'))
    resetDefaultHook()
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.unstubAllEnvs()
    resetDefaultHook()
  })

  it('publishes to the directory named in the environment', () => {
    vi.stubEnv('EVPN_MH_STATUS_DIR', dir)
    vi.stubEnv('EVPN_MH_SINK', 'file')
    vi.stubEnv('LOG_LEVEL', '')

    const result = onRibProcessDplaneResults({ zd_ifname: 'bond7', br_port: { flags: 1 } })

    expect(result).toEqual({})
    expect(readFileSync(join(dir, 'evpn_df_status_bond7.json'), 'utf8')).toBe(
      '{"interface":"bond7","df_status":"non-df"}\n'
    )
  })

  it('returns the empty result when the configuration is invalid', () => {
    vi.stubEnv('EVPN_MH_SINK', 'process')
    vi.stubEnv('EVPN_MH_HELPER_COMMAND', '')
    vi.stubEnv('LOG_LEVEL', '')

    expect(onRibProcessDplaneResults({ zd_ifname: 'bond7', br_port: { flags: 1 } })).toEqual({})
  })
})
