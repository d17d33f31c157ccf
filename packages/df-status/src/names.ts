/**
 * Everything outside `[A-Za-z0-9._-]`. No `u` flag: each UTF-16 code unit is
 * replaced on its own so the output keeps the input's length.
 */
const UNSAFE_CHARS = /[^A-Za-z0-9._-]/g

/**
 * Map an interface name to a token usable as a single path component.
 */
export function sanitize(name?: string): string {
  return (name ?? '').replace(UNSAFE_CHARS, '_')
}

export const STATUS_FILE_PREFIX = 'evpn_df_status_'
export const STATUS_FILE_SUFFIX = '.json'

export function statusFileName(interfaceName: string): string {
  return `${STATUS_FILE_PREFIX}${sanitize(interfaceName)}${STATUS_FILE_SUFFIX}`
}

/**
 * POSIX single-quote one argument: `'` becomes `'\''`.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function formatCommandLine(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ')
}
