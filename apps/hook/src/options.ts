import type { Command } from 'commander'
import type { HookConfig } from '@evpn-mh/config'
import { errorMessage } from '@evpn-mh/types'
import type { Result } from '@evpn-mh/types'
import { applyConfigFileValues, loadConfigFile } from './config-file.js'
import { HookCliOptionsSchema, buildConfig, formatIssues } from './types.js'

/**
 * Resolve the effective hook configuration for `program`.
 *
 * Precedence: CLI flag > environment variable > config file > default.
 */
export async function resolveHookConfig(program: Command): Promise<Result<HookConfig>> {
  try {
    const configPath: unknown = program.getOptionValue('config')
    if (typeof configPath === 'string' && configPath) {
      applyConfigFileValues(program, await loadConfigFile(configPath))
    }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }

  const validation = HookCliOptionsSchema.safeParse(program.opts())
  if (!validation.success) {
    return { success: false, error: formatIssues(validation.error) }
  }
  return buildConfig(validation.data)
}
