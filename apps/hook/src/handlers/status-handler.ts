import { readDfStatus } from '@evpn-mh/df-status'
import type { DfStatusMap } from '@evpn-mh/df-status'
import { errorMessage } from '@evpn-mh/types'
import type { Result } from '@evpn-mh/types'

export interface StatusHandlerInput {
  baseDir: string
  settleMs: number
}

/**
 * Read every published DF status under the status directory.
 */
export async function statusHandler(input: StatusHandlerInput): Promise<Result<DfStatusMap>> {
  try {
    const status = await readDfStatus(input.baseDir, { settleMs: input.settleMs })
    return { success: true, data: status }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }
}
