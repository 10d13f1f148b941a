import type { SessionState } from "../value-objects/session-state.vo"

/**
 * Error returned when a transition is not allowed from the current state
 */
export class InvalidStateTransitionError extends Error {
  readonly code = "INVALID_STATE_TRANSITION"

  constructor(
    public readonly currentState: SessionState,
    public readonly targetState: SessionState,
  ) {
    super(`Cannot move from ${currentState} to ${targetState}`)
    this.name = "InvalidStateTransitionError"
  }
}

/**
 * A recording was requested while another recording session still exists.
 * The state machine makes this unreachable; the guard stays anyway.
 */
export class AlreadyRecordingError extends Error {
  readonly code = "ALREADY_RECORDING"

  constructor(public readonly existingSessionId: string) {
    super(`Recording session ${existingSessionId} is still active`)
    this.name = "AlreadyRecordingError"
  }
}

/**
 * Error returned when the PID file cannot be claimed, written or removed
 */
export class PidFileError extends Error {
  readonly code = "PID_FILE_ERROR"

  constructor(
    message: string,
    public readonly path: string,
    public readonly existingPid?: number,
  ) {
    super(message)
    this.name = "PidFileError"
  }
}
