import type { RawEdge } from "../../domain/input/value-objects/button-event.vo"
import type { Result } from "../../domain/shared/result"

export class EdgeSourceError extends Error {
  readonly code = "EDGE_SOURCE_ERROR"

  constructor(message: string) {
    super(message)
    this.name = "EdgeSourceError"
  }
}

export interface EdgeSourceCallbacks {
  onEdge: (edge: RawEdge) => void
  onError: (error: EdgeSourceError) => void
}

/**
 * Port interface for the raw button line.
 * Edges carry monotonic timestamps in milliseconds.
 */
export interface EdgeSourcePort {
  start(callbacks: EdgeSourceCallbacks): Result<void, EdgeSourceError>
  stop(): Promise<void>
}
