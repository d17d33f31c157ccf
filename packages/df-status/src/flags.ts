import { DfClassification } from './types.js'

/** Bit 0 of the bridge port flag word marks the local node as non-DF. */
export const NON_DF_FLAG = 1

/**
 * Decode a bridge port flag word. Absent flags count as 0.
 *
 * `&` works on the low 32 bits of a number, which always contain bit 0 of
 * an integer; wide bitfields arrive as bigints.
 */
export function classify(flags?: number | bigint): DfClassification {
  if (typeof flags === 'bigint') {
    return (flags & BigInt(NON_DF_FLAG)) !== 0n ? DfClassification.NON_DF : DfClassification.DF
  }
  return ((flags ?? 0) & NON_DF_FLAG) !== 0 ? DfClassification.NON_DF : DfClassification.DF
}

const DIGITS = /^\d+$/

/**
 * Turn whatever the daemon put in `flags` into a flag word.
 *
 * Finite non-negative numbers are truncated, non-negative bigints pass
 * through, decimal strings become bigints. Anything else is 0.
 */
export function coerceFlags(value: unknown): number | bigint {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : 0
  }
  if (typeof value === 'bigint') {
    return value >= 0n ? value : 0
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return DIGITS.test(trimmed) ? BigInt(trimmed) : 0
  }
  return 0
}
