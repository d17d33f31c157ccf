import { loadDefaultConfig } from '@evpn-mh/config'
import type { HookConfig } from '@evpn-mh/config'
import { getLogger } from '@evpn-mh/telemetry'
import { errorMessage } from '@evpn-mh/types'
import { extractBridgePortUpdate } from './event.js'
import { classify } from './flags.js'
import { createStatusSink } from './sinks/index.js'
import type { PublishResult, StatusSink } from './sinks/index.js'
import { createStatusRecord } from './types.js'
import type { CallbackResult } from './types.js'

export type HookState = 'idle' | 'processing'

export interface DfStatusHookOptions {
  sink: StatusSink
}

/**
 * Entry point the daemon calls after each dataplane result batch.
 *
 * Every call returns a fresh `{}` and leaves the hook idle, whatever
 * happened while publishing. Nothing is thrown back at the daemon.
 */
export class DfStatusHook {
  readonly sink: StatusSink
  private _state: HookState = 'idle'
  private _lastResult: PublishResult | undefined
  private readonly logger = getLogger(['evpn-mh', 'hook'])

  constructor(options: DfStatusHookOptions) {
    this.sink = options.sink
  }

  static fromConfig(config: Pick<HookConfig, 'baseDir' | 'sink'>): DfStatusHook {
    return new DfStatusHook({ sink: createStatusSink(config) })
  }

  get state(): HookState {
    return this._state
  }

  /** Outcome of the most recent publish, `undefined` when the last event was skipped. */
  get lastResult(): PublishResult | undefined {
    return this._lastResult
  }

  handle(event: unknown): CallbackResult {
    this._state = 'processing'
    this._lastResult = undefined
    try {
      const update = extractBridgePortUpdate(event)
      if (!update) {
        return {}
      }

      const record = createStatusRecord(update.interfaceName, classify(update.flags))
      const result = this.sink.publish(record)
      this._lastResult = result
      if (result.success) {
        this.logger.debug('Published {status} for {interfaceName}', {
          status: record.status,
          interfaceName: record.interfaceName,
        })
      }
    } catch (error) {
      this.logger.error('DF status hook failed: {message}', { message: errorMessage(error) })
    } finally {
      this._state = 'idle'
    }
    return {}
  }
}

let defaultHook: DfStatusHook | undefined

/**
 * Daemon-facing callback bound to a hook built from the environment on
 * first use. A configuration error is logged and the batch skipped.
 */
export function onRibProcessDplaneResults(event: unknown): CallbackResult {
  try {
    defaultHook ??= DfStatusHook.fromConfig(loadDefaultConfig())
  } catch (error) {
    getLogger(['evpn-mh', 'hook']).error('Invalid hook configuration: {message}', {
      message: errorMessage(error),
    })
    return {}
  }
  return defaultHook.handle(event)
}

/**
 * @internal
 * Drop the environment-bound hook so the next call reloads configuration.
 * Intended for test teardown only.
 */
export function resetDefaultHook(): void {
  defaultHook = undefined
}
