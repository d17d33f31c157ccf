import type { OptionalResult } from '@evpn-mh/types'
import type { StatusRecord } from '../types.js'

export type PublishErrorKind = 'io' | 'spawn'

export interface PublishError {
  kind: PublishErrorKind
  message: string
  /** File path or command line the publish was aimed at. */
  target: string
}

export type PublishResult = OptionalResult<void, PublishError>

/**
 * Makes a status record observable outside the process.
 *
 * Implementations never throw: failures come back as a result and are
 * logged by the sink itself.
 */
export interface StatusSink {
  readonly kind: 'file' | 'process'
  publish(record: StatusRecord): PublishResult
}
