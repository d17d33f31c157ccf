import { HookConfigSchema, LogLevelSchema } from '@evpn-mh/config'
import type { HookConfig } from '@evpn-mh/config'
import type { Result } from '@evpn-mh/types'
import { z } from 'zod'

export const HookCliOptionsSchema = z.object({
  config: z.string().optional(),
  statusDir: z.string().min(1),
  sink: z.enum(['file', 'process']),
  helperCommand: z.string().optional(),
  helperScript: z.string().optional(),
  logLevel: LogLevelSchema,
})
export type HookCliOptions = z.infer<typeof HookCliOptionsSchema>

export const StatusInputSchema = z.object({
  settleMs: z.coerce.number().int().min(0),
})
export type StatusInput = z.infer<typeof StatusInputSchema>

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Build a HookConfig from validated CLI options.
 */
export function buildConfig(opts: HookCliOptions): Result<HookConfig> {
  const sink =
    opts.sink === 'process'
      ? { type: 'process', command: opts.helperCommand, script: opts.helperScript || undefined }
      : { type: 'file' }

  const parsed = HookConfigSchema.safeParse({
    baseDir: opts.statusDir,
    sink,
    logLevel: opts.logLevel,
  })
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error) }
  }
  return { success: true, data: parsed.data }
}
