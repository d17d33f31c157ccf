import { isInteger, isSafeNumber, parse } from 'lossless-json'
import { z } from 'zod'
import { coerceFlags } from './flags.js'

/**
 * Bridge port state attached to a dataplane result. `flags` is kept as
 * received and coerced later.
 */
const BridgePortSchema = z.object({ flags: z.unknown() }).passthrough()

/**
 * Daemon context for one dataplane result batch. The daemon's own field
 * names (`zd_ifname`, `br_port`) are accepted next to the camelCase ones.
 */
export const DataplaneEventSchema = z
  .object({
    interfaceName: z.unknown(),
    zd_ifname: z.unknown(),
    bridgePort: BridgePortSchema.nullish().catch(undefined),
    br_port: BridgePortSchema.nullish().catch(undefined),
  })
  .passthrough()

export interface BridgePortUpdate {
  interfaceName: string
  flags: number | bigint
}

function parseNumber(value: string): number | bigint {
  return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : Number(value)
}

/**
 * Parse the event JSON handed over by the daemon. Integers beyond
 * `Number.MAX_SAFE_INTEGER` become bigints so wide flag words keep bit 0.
 *
 * Throws on malformed JSON.
 */
export function parseEvent(text: string): unknown {
  return parse(text, null, parseNumber)
}

function nameOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'bigint') return String(value)
  return undefined
}

/**
 * Pull the interface name and flag word out of a daemon event.
 *
 * Returns `undefined` when there is no event or no bridge port, which
 * means the batch carries nothing to publish.
 */
export function extractBridgePortUpdate(event: unknown): BridgePortUpdate | undefined {
  const parsed = DataplaneEventSchema.safeParse(event)
  if (!parsed.success) return undefined

  const bridgePort = parsed.data.bridgePort ?? parsed.data.br_port
  if (!bridgePort) return undefined

  return {
    interfaceName: nameOf(parsed.data.interfaceName) ?? nameOf(parsed.data.zd_ifname) ?? '',
    flags: coerceFlags(bridgePort.flags),
  }
}
