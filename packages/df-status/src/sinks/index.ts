import type { SinkConfig } from '@evpn-mh/config'
import { FileStatusSink } from './file.js'
import { ProcessStatusSink } from './process.js'
import type { SpawnFn } from './process.js'
import type { StatusSink } from './types.js'

export interface CreateStatusSinkOptions {
  baseDir: string
  sink: SinkConfig
  spawn?: SpawnFn
}

export function createStatusSink(options: CreateStatusSinkOptions): StatusSink {
  switch (options.sink.type) {
    case 'file':
      return new FileStatusSink({ baseDir: options.baseDir })
    case 'process':
      return new ProcessStatusSink({
        command: options.sink.command,
        script: options.sink.script,
        spawn: options.spawn,
      })
  }
}

export { FileStatusSink, formatStatusDocument } from './file.js'
export type { FileStatusSinkOptions } from './file.js'
export { ProcessStatusSink, statusArgument } from './process.js'
export type { DetachedChild, ProcessStatusSinkOptions, SpawnFn } from './process.js'
export type { PublishError, PublishErrorKind, PublishResult, StatusSink } from './types.js'
