import { Command, Option } from 'commander'
import chalk from 'chalk'
import { configureLogger } from '@evpn-mh/telemetry'
import { statusHandler } from '../handlers/status-handler.js'
import type { CliIo } from '../io.js'
import { resolveHookConfig } from '../options.js'
import { StatusInputSchema, formatIssues } from '../types.js'

export function statusCommand(program: Command, io: CliIo): Command {
  return new Command('status')
    .description('Print the published DF status of every interface as JSON')
    .addOption(
      new Option('--settle-ms <ms>', 'Delay between the two reads of each status file').default(
        '500'
      )
    )
    .action(async (options: { settleMs: string }) => {
      const config = await resolveHookConfig(program)
      if (!config.success) {
        io.stderr(`${chalk.red('Invalid configuration:')} ${config.error}\n`)
        process.exitCode = 1
        return
      }
      await configureLogger({ level: config.data.logLevel })

      const validation = StatusInputSchema.safeParse(options)
      if (!validation.success) {
        io.stderr(`${chalk.red('Invalid input:')} ${formatIssues(validation.error)}\n`)
        process.exitCode = 1
        return
      }

      const result = await statusHandler({
        baseDir: config.data.baseDir,
        settleMs: validation.data.settleMs,
      })
      if (!result.success) {
        io.stderr(`${chalk.red('Error reading DF status:')} ${result.error}\n`)
        process.exitCode = 1
        return
      }

      io.stdout(JSON.stringify(result.data, null, 2) + '\n')
    })
}
