import { spawn as nodeSpawn } from 'node:child_process'
import type { SpawnOptions } from 'node:child_process'
import { getLogger } from '@evpn-mh/telemetry'
import { errorMessage } from '@evpn-mh/types'
import { formatCommandLine } from '../names.js'
import { DfClassification } from '../types.js'
import type { StatusRecord } from '../types.js'
import type { PublishResult, StatusSink } from './types.js'

/**
 * The slice of a child process the sink touches.
 */
export interface DetachedChild {
  on(event: 'error', listener: (err: Error) => void): unknown
  unref(): void
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => DetachedChild

export interface ProcessStatusSinkOptions {
  /** Executable, usually the helper's interpreter. */
  command: string
  /** Helper path, passed as the first argument when set. */
  script?: string
  spawn?: SpawnFn
}

/** `"1"` for non-DF, `"0"` for DF, as the helper reads its last argument. */
export function statusArgument(status: DfClassification): '0' | '1' {
  return status === DfClassification.NON_DF ? '1' : '0'
}

/**
 * Launches the helper detached with the interface name and status as
 * discrete arguments. No shell is involved, the child's output is
 * discarded and its exit status is never collected.
 */
export class ProcessStatusSink implements StatusSink {
  readonly kind = 'process'
  private readonly command: string
  private readonly script: string | undefined
  private readonly spawn: SpawnFn
  private readonly logger = getLogger(['evpn-mh', 'sink', 'process'])

  constructor(options: ProcessStatusSinkOptions) {
    this.command = options.command
    this.script = options.script
    this.spawn = options.spawn ?? nodeSpawn
  }

  argsFor(record: StatusRecord): string[] {
    const args = [record.interfaceName, statusArgument(record.status)]
    return this.script ? [this.script, ...args] : args
  }

  publish(record: StatusRecord): PublishResult {
    const args = this.argsFor(record)
    const commandLine = formatCommandLine([this.command, ...args])

    try {
      const child = this.spawn(this.command, args, {
        detached: true,
        stdio: 'ignore',
        shell: false,
      })
      child.on('error', (err) => {
        this.logger.error('DF status helper failed: {commandLine}: {message}', {
          commandLine,
          message: err.message,
        })
      })
      child.unref()
    } catch (error) {
      const message = errorMessage(error)
      this.logger.error('Failed to spawn DF status helper: {commandLine}: {message}', {
        commandLine,
        message,
      })
      return { success: false, error: { kind: 'spawn', message, target: commandLine } }
    }

    this.logger.debug('Spawned DF status helper: {commandLine}', { commandLine })
    return { success: true }
  }
}
