import { Command, Option } from 'commander'
import { configureLogger } from '@evpn-mh/telemetry'
import { runHookHandler } from '../handlers/run-hook-handler.js'
import type { CliIo } from '../io.js'
import { resolveHookConfig } from '../options.js'

export function runCommand(program: Command, io: CliIo): Command {
  return new Command('run')
    .description(
      'Handle one dataplane result batch: read the event JSON, publish the DF status, print {}'
    )
    .addOption(new Option('--event <json>', 'Event JSON (read from stdin when omitted)'))
    .action(async (options: { event?: string }) => {
      const config = await resolveHookConfig(program)
      await configureLogger({ level: config.success ? config.data.logLevel : undefined })

      let eventText = options.event ?? ''
      if (options.event === undefined) {
        try {
          eventText = await io.readStdin()
        } catch {
          eventText = ''
        }
      }

      const result = runHookHandler({ config, eventText })
      io.stdout(JSON.stringify(result) + '\n')
    })
}
