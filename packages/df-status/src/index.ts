export { DfClassification, createStatusRecord } from './types.js'
export type { CallbackResult, StatusRecord } from './types.js'
export { NON_DF_FLAG, classify, coerceFlags } from './flags.js'
export {
  STATUS_FILE_PREFIX,
  STATUS_FILE_SUFFIX,
  formatCommandLine,
  sanitize,
  shellQuote,
  statusFileName,
} from './names.js'
export { DataplaneEventSchema, extractBridgePortUpdate, parseEvent } from './event.js'
export type { BridgePortUpdate } from './event.js'
export {
  FileStatusSink,
  ProcessStatusSink,
  createStatusSink,
  formatStatusDocument,
  statusArgument,
} from './sinks/index.js'
export type {
  CreateStatusSinkOptions,
  DetachedChild,
  FileStatusSinkOptions,
  ProcessStatusSinkOptions,
  PublishError,
  PublishErrorKind,
  PublishResult,
  SpawnFn,
  StatusSink,
} from './sinks/index.js'
export { DfStatusHook, onRibProcessDplaneResults, resetDefaultHook } from './hook.js'
export type { DfStatusHookOptions, HookState } from './hook.js'
export { StatusDocumentSchema, readDfStatus } from './reader.js'
export type { DfStatusMap, ReadDfStatusOptions, StatusDocument } from './reader.js'
