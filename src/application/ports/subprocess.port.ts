/**
 * How an external process ended
 */
export interface ProcessExit {
  code: number | null
  signal: NodeJS.Signals | null
  /** Tail of whatever the process wrote to stderr */
  stderr: string
  /** Set when the process could not be spawned or waited on */
  error?: Error
}

/**
 * Handle to one owned external process
 */
export interface SubprocessHandle {
  readonly path: string
  readonly pid: number | undefined
  readonly isAlive: boolean
  readonly exited: Promise<ProcessExit>
}

export function describeExit(exit: ProcessExit): string {
  if (exit.error) return exit.error.message
  const status =
    exit.signal !== null ? `signal ${exit.signal}` : `exit code ${exit.code}`
  const detail = exit.stderr.trim()
  return detail ? `${status}: ${detail}` : status
}
