import { spawn } from "node:child_process"
import type { Readable } from "node:stream"

/**
 * The part of a child process the adapters rely on
 */
export interface ChildLike {
  readonly pid?: number | undefined
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals): boolean
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this
  once(event: "error", listener: (error: Error) => void): this
}

export interface SpawnOptions {
  /** Pipe stdout instead of discarding it */
  stdout?: boolean
}

export type Spawner = (
  command: string,
  args: readonly string[],
  options?: SpawnOptions,
) => ChildLike

export const spawnProcess: Spawner = (command, args, options = {}) =>
  spawn(command, args, {
    stdio: ["ignore", options.stdout ? "pipe" : "ignore", "pipe"],
  })

/**
 * Resolve with the promise's value, or null once `ms` have passed
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
