import { createLogger, format, type Logger, transports } from 'winston'

export type { Logger }

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface LoggerOptions {
  logLevel?: LogLevel
  /** Disable colors, e.g. when stdout is journald */
  plain?: boolean
}

const printf = format.printf(({ level, message, timestamp, ...meta }) => {
  const extra =
    Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta, bigintReplacer)}`
      : ''
  return `${String(timestamp)} ${level} ${String(message)}${extra}`
})

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

/**
 * Console logger used by every monitor component
 */
export function getLogger(options: LoggerOptions = {}): Logger {
  const { logLevel = 'info', plain = false } = options
  return createLogger({
    level: logLevel,
    format: plain
      ? format.combine(format.timestamp(), printf)
      : format.combine(
          format.colorize({ level: true }),
          format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          printf,
        ),
    transports: [new transports.Console()],
  })
}
