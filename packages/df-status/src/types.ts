export const DfClassification = {
  DF: 'df',
  NON_DF: 'non-df',
} as const

/**
 * Designated Forwarder role of the local node for one bridge port.
 * The string values are what the status file carries in `df_status`.
 */
export type DfClassification = (typeof DfClassification)[keyof typeof DfClassification]

export interface StatusRecord {
  readonly interfaceName: string
  readonly status: DfClassification
}

export function createStatusRecord(interfaceName: string, status: DfClassification): StatusRecord {
  return Object.freeze({ interfaceName, status })
}

/**
 * Canonical response the daemon expects from every callback.
 */
export type CallbackResult = Record<string, never>
