import { readFile } from 'node:fs/promises'
import type { Command } from 'commander'
import { z } from 'zod'

/**
 * JSON config file schema for the hook CLI.
 *
 * All fields are optional — config files provide base values that
 * CLI flags and environment variables can override.
 *
 * Keys use camelCase matching the CLI option names.
 * Unknown keys are rejected (.strict()) to catch typos early.
 */
export const ConfigFileSchema = z
  .object({
    statusDir: z.string().optional(),
    sink: z.enum(['file', 'process']).optional(),
    helperCommand: z.string().optional(),
    helperScript: z.string().optional(),
    logLevel: z.string().optional(),
  })
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Load and validate a JSON config file from the given path.
 *
 * @throws {Error} if the file does not exist, is not valid JSON,
 *   or fails Zod validation
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, string>> {
  let text: string
  try {
    text = await readFile(filePath, 'utf8')
  } catch {
    throw new Error(`Config file not found: ${filePath}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new Error(`Config file is not valid JSON: ${filePath}`)
  }

  const parsed = ConfigFileSchema.parse(raw)

  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (value === undefined) continue
    result[key] = value
  }
  return result
}

/**
 * Apply config file values to a Commander command instance.
 *
 * Only sets values where the current source is 'default' — meaning
 * neither CLI flags nor environment variables provided a value.
 * Tags injected values with source 'config' for proper precedence.
 */
export function applyConfigFileValues(cmd: Command, configValues: Record<string, string>): void {
  for (const [key, value] of Object.entries(configValues)) {
    const source = cmd.getOptionValueSource(key)
    if (source === 'default' || source === undefined) {
      cmd.setOptionValueWithSource(key, value, 'config')
    }
  }
}
