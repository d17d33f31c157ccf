import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import { ROOT_CATEGORY, validateEnvironment, validateLogLevel } from './constants.js'
import type { Environment, LogLevel } from './constants.js'

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
  /**
   * Where formatted lines go. Defaults to stderr: stdout belongs to the
   * daemon callback protocol.
   */
  write?: (line: string) => void
}

let configPromise: Promise<void> | null = null
let configured = false

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    // Circular reference — retry with a replacer that marks cycles
    try {
      const seen = new WeakSet<object>()
      return JSON.stringify(value, (_key, val: unknown) => {
        if (typeof val === 'object' && val !== null) {
          if (seen.has(val)) return '[Circular]'
          seen.add(val)
        }
        return val
      })
    } catch {
      return String(value)
    }
  }
}

function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
}

const LEVEL_COLORS: Record<string, string> = {
  debug: ANSI.dim,
  info: ANSI.cyan,
  warning: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.magenta,
}

function writeStderr(line: string): void {
  process.stderr.write(line + '\n')
}

// ---------------------------------------------------------------------------
// Sink factories
// ---------------------------------------------------------------------------

export function createPrettySink(write: (line: string) => void = writeStderr): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const color = LEVEL_COLORS[record.level] ?? ''
    const category = record.category.join('.')
    const msg = formatMessage(record)
    const props = Object.keys(record.properties).length
      ? ` ${safeStringify(record.properties)}`
      : ''
    write(
      `${ANSI.dim}${time}${ANSI.reset} ${color}${level}${ANSI.reset} ${ANSI.blue}${category}${ANSI.reset}: ${msg}${props}`
    )
  }
}

export function createJsonSink(write: (line: string) => void = writeStderr): Sink {
  return (record: LogRecord) => {
    write(
      safeStringify({
        timestamp: record.timestamp,
        level: record.level,
        category: record.category.join('.'),
        message: formatMessage(record),
        ...(Object.keys(record.properties).length ? { properties: record.properties } : {}),
      })
    )
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Configure LogTape with an environment-appropriate sink.
 *
 * Production gets one JSON object per line, everything else a coloured
 * single-line format. Safe to call multiple times — subsequent calls are
 * no-ops once configuration succeeds.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = doConfigureLogger(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function doConfigureLogger(config?: LoggerConfig): Promise<void> {
  const level: LogLevel = config?.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'

  const sink =
    environment === 'production' ? createJsonSink(config?.write) : createPrettySink(config?.write)

  await configure({
    sinks: { main: sink },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['main'] },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: ['main'] },
    ],
  })
}

/**
 * @internal
 * Reset all internal state so `configureLogger` can be called again.
 * Intended for test teardown only.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
export type { LogLevel, Environment }
