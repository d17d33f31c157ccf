import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { getLogger } from '@evpn-mh/telemetry'
import { errorMessage } from '@evpn-mh/types'
import { statusFileName } from '../names.js'
import type { StatusRecord } from '../types.js'
import type { PublishResult, StatusSink } from './types.js'

export interface FileStatusSinkOptions {
  /** Existing directory for status files. Never created here. */
  baseDir: string
  /** Replaces the file write; tests use it to force failures. */
  writeFile?: (path: string, data: string) => void
}

function overwrite(path: string, data: string): void {
  writeFileSync(path, data, { encoding: 'utf8', flag: 'w' })
}

/**
 * Single-line status document. `JSON.stringify` escapes the raw interface
 * name; the sanitized token only ever appears in the file name.
 */
export function formatStatusDocument(record: StatusRecord): string {
  return JSON.stringify({ interface: record.interfaceName, df_status: record.status }) + '\n'
}

/**
 * Writes `{baseDir}/evpn_df_status_<token>.json`, truncating any previous
 * content. Last write wins.
 */
export class FileStatusSink implements StatusSink {
  readonly kind = 'file'
  readonly baseDir: string
  private readonly writeFile: (path: string, data: string) => void
  private readonly logger = getLogger(['evpn-mh', 'sink', 'file'])

  constructor(options: FileStatusSinkOptions) {
    this.baseDir = options.baseDir
    this.writeFile = options.writeFile ?? overwrite
  }

  pathFor(interfaceName: string): string {
    return join(this.baseDir, statusFileName(interfaceName))
  }

  publish(record: StatusRecord): PublishResult {
    const path = this.pathFor(record.interfaceName)
    try {
      this.writeFile(path, formatStatusDocument(record))
    } catch (error) {
      const message = errorMessage(error)
      this.logger.error('Failed to write DF status file {path}: {message}', { path, message })
      return { success: false, error: { kind: 'io', message, target: path } }
    }

    this.logger.debug('Wrote {status} for {interfaceName} to {path}', {
      status: record.status,
      interfaceName: record.interfaceName,
      path,
    })
    return { success: true }
  }
}
