import { z } from 'zod'

/**
 * Directory the daemon deployment creates for status files.
 */
export const DEFAULT_STATUS_DIR = '/run/frr/evpn-mh'

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'fatal'])

export type LogLevel = z.infer<typeof LogLevelSchema>

/**
 * Status file sink: one JSON document per interface under `baseDir`.
 */
export const FileSinkConfigSchema = z.object({
  type: z.literal('file'),
})

/**
 * Helper process sink.
 *
 * `command` is the executable (usually an interpreter such as `python3`),
 * `script` the optional helper path passed as its first argument.
 */
export const ProcessSinkConfigSchema = z.object({
  type: z.literal('process'),
  command: z.string().min(1),
  script: z.string().min(1).optional(),
})

export const SinkConfigSchema = z.discriminatedUnion('type', [
  FileSinkConfigSchema,
  ProcessSinkConfigSchema,
])

export type SinkConfig = z.infer<typeof SinkConfigSchema>

/**
 * Top-level hook configuration
 */
export const HookConfigSchema = z.object({
  baseDir: z.string().min(1).default(DEFAULT_STATUS_DIR),
  sink: SinkConfigSchema.default({ type: 'file' }),
  logLevel: LogLevelSchema.default('info'),
})

export type HookConfig = z.infer<typeof HookConfigSchema>

type Env = Record<string, string | undefined>

/**
 * Loads the hook configuration from environment variables.
 *
 * - `EVPN_MH_STATUS_DIR`: status file directory
 * - `EVPN_MH_SINK`: `file` (default) or `process`
 * - `EVPN_MH_HELPER_COMMAND` / `EVPN_MH_HELPER_SCRIPT`: process sink helper
 * - `LOG_LEVEL`: diagnostic log level
 *
 * @throws {z.ZodError} when the variables describe an invalid configuration
 */
export function loadDefaultConfig(env: Env = process.env): HookConfig {
  const sinkType = env.EVPN_MH_SINK || 'file'

  const sink =
    sinkType === 'process'
      ? {
          type: 'process',
          command: env.EVPN_MH_HELPER_COMMAND,
          script: env.EVPN_MH_HELPER_SCRIPT || undefined,
        }
      : { type: sinkType }

  return HookConfigSchema.parse({
    baseDir: env.EVPN_MH_STATUS_DIR || undefined,
    sink,
    logLevel: env.LOG_LEVEL || undefined,
  })
}
