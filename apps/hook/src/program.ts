import { Command, Option } from 'commander'
import { DEFAULT_STATUS_DIR } from '@evpn-mh/config'
import { runCommand } from './commands/run.js'
import { statusCommand } from './commands/status.js'
import { processIo } from './io.js'
import type { CliIo } from './io.js'

export function createProgram(io: CliIo = processIo): Command {
  const program = new Command()

  program
    .name('evpn-df-hook')
    .description('EVPN multihoming DF status hook for dataplane result callbacks')
    .version(process.env.VERSION || '0.1.0')
    .addOption(new Option('--config <path>', 'Path to JSON config file').env('EVPN_MH_CONFIG'))
    .addOption(
      new Option('--status-dir <path>', 'Existing directory for DF status files')
        .env('EVPN_MH_STATUS_DIR')
        .default(DEFAULT_STATUS_DIR)
    )
    .addOption(
      new Option('--sink <type>', 'How the status is published: file or process')
        .env('EVPN_MH_SINK')
        .default('file')
    )
    .addOption(
      new Option('--helper-command <command>', 'Executable spawned by the process sink').env(
        'EVPN_MH_HELPER_COMMAND'
      )
    )
    .addOption(
      new Option('--helper-script <path>', 'Helper script passed to the helper command').env(
        'EVPN_MH_HELPER_SCRIPT'
      )
    )
    .addOption(new Option('--log-level <level>', 'Log level').env('LOG_LEVEL').default('info'))

  program.addCommand(runCommand(program, io))
  program.addCommand(statusCommand(program, io))

  return program
}

export type { CliIo } from './io.js'
