import type { HookConfig } from '@evpn-mh/config'
import { DfStatusHook, parseEvent } from '@evpn-mh/df-status'
import type { CallbackResult } from '@evpn-mh/df-status'
import { getLogger } from '@evpn-mh/telemetry'
import type { Result } from '@evpn-mh/types'

export interface RunHookInput {
  config: Result<HookConfig>
  /** Raw event JSON as handed over by the daemon. */
  eventText: string
}

const logger = getLogger(['evpn-mh', 'cli', 'run'])

/**
 * Run one callback invocation for the CLI. Configuration and decoding
 * problems are logged and still answered with the empty result.
 */
export function runHookHandler(input: RunHookInput): CallbackResult {
  if (!input.config.success) {
    logger.error('Invalid hook configuration: {error}', { error: input.config.error })
    return {}
  }

  const text = input.eventText.trim()
  if (!text) {
    logger.debug('Empty event, nothing to publish')
    return {}
  }

  let event: unknown
  try {
    event = parseEvent(text)
  } catch {
    logger.warn('Event is not valid JSON, skipping')
    return {}
  }

  return DfStatusHook.fromConfig(input.config.data).handle(event)
}
