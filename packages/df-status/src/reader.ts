import { readdir, readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { z } from 'zod'
import { getLogger } from '@evpn-mh/telemetry'
import { STATUS_FILE_PREFIX, STATUS_FILE_SUFFIX } from './names.js'

export const StatusDocumentSchema = z.object({
  interface: z.string(),
  df_status: z.enum(['df', 'non-df']),
})

export type StatusDocument = z.infer<typeof StatusDocumentSchema>

export type DfStatusMap = Record<string, StatusDocument['df_status']>

export interface ReadDfStatusOptions {
  /**
   * Delay between the two reads of each file. A file whose mtime changes
   * in between is still being written and is skipped.
   */
  settleMs?: number
}

interface Snapshot {
  document: StatusDocument | undefined
  mtimeMs: number
}

const logger = getLogger(['evpn-mh', 'reader'])

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

async function snapshot(path: string): Promise<Snapshot | undefined> {
  let mtimeMs: number
  try {
    mtimeMs = (await stat(path)).mtimeMs
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return undefined
    throw error
  }

  try {
    const parsed = StatusDocumentSchema.safeParse(JSON.parse(await readFile(path, 'utf8')))
    return { document: parsed.success ? parsed.data : undefined, mtimeMs }
  } catch {
    // Torn or empty file from a write in progress
    return { document: undefined, mtimeMs }
  }
}

/**
 * Collect the DF status of every interface with a status file in `baseDir`.
 *
 * Returns `{}` when the directory does not exist.
 */
export async function readDfStatus(
  baseDir: string,
  options: ReadDfStatusOptions = {}
): Promise<DfStatusMap> {
  const settleMs = options.settleMs ?? 500

  let entries: string[]
  try {
    entries = await readdir(baseDir)
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return {}
    throw error
  }

  // Interface names such as `__proto__` must become own properties
  const status = new Map<string, StatusDocument['df_status']>()
  for (const name of entries.sort()) {
    if (!name.startsWith(STATUS_FILE_PREFIX) || !name.endsWith(STATUS_FILE_SUFFIX)) continue

    const path = join(baseDir, name)
    const first = await snapshot(path)
    if (!first?.document) continue

    if (settleMs > 0) await sleep(settleMs)

    const second = await snapshot(path)
    if (!second?.document || second.mtimeMs !== first.mtimeMs) {
      logger.debug('Skipping {path}: changed while reading', { path })
      continue
    }

    status.set(second.document.interface, second.document.df_status)
  }
  return Object.fromEntries(status)
}
