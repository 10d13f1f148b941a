import pino, { type Logger } from "pino"

export interface LoggerOptions {
  verbose: boolean
  /** Append to this file as well as stdout; null for stdout only */
  file: string | null
}

/**
 * JSON-lines logger: one object per line with an ISO timestamp and the
 * message tag in `msg`.
 */
export function createLogger(options: LoggerOptions): Logger {
  const level = options.verbose ? "debug" : "info"
  const streams: pino.StreamEntry[] = [
    { level, stream: pino.destination({ dest: 1, sync: true }) },
  ]
  if (options.file) {
    streams.push({
      level,
      stream: pino.destination({ dest: options.file, mkdir: true, sync: true }),
    })
  }

  return pino(
    {
      level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  )
}
