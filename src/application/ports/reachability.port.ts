import type { Result } from "../../domain/shared/result"

export class UnreachableError extends Error {
  readonly code = "UNREACHABLE"

  constructor(
    message: string,
    public readonly target: string,
  ) {
    super(message)
    this.name = "UnreachableError"
  }
}

/**
 * Port interface for the network readiness check
 */
export interface ReachabilityPort {
  /** Human-readable host:port being probed */
  readonly target: string

  probe(signal?: AbortSignal): Promise<Result<void, UnreachableError>>
}
