import { Result } from "../../shared/result"
import { InvalidStateTransitionError } from "../errors/session.errors"
import {
  type SessionState,
  SessionStates,
} from "../value-objects/session-state.vo"

/**
 * Allowed transitions. Every state may also move to shuttingDown,
 * which is terminal.
 *
 *   booting          -> connecting
 *   connecting       -> ready
 *   ready            -> recording
 *   recording        -> uploading | recoveringError
 *   uploading        -> awaitingPlayback | ready | recoveringError
 *   awaitingPlayback -> playing | recoveringError
 *   playing          -> ready | recoveringError
 *   recoveringError  -> ready
 */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  booting: [SessionStates.CONNECTING],
  connecting: [SessionStates.READY],
  ready: [SessionStates.RECORDING],
  recording: [SessionStates.UPLOADING, SessionStates.RECOVERING_ERROR],
  uploading: [
    SessionStates.AWAITING_PLAYBACK,
    SessionStates.READY,
    SessionStates.RECOVERING_ERROR,
  ],
  awaitingPlayback: [SessionStates.PLAYING, SessionStates.RECOVERING_ERROR],
  playing: [SessionStates.READY, SessionStates.RECOVERING_ERROR],
  recoveringError: [SessionStates.READY],
  shuttingDown: [],
}

/**
 * Session state machine entity.
 * Holds the single current state and rejects transitions the table
 * above does not list.
 */
export class SessionMachine {
  private _state: SessionState = SessionStates.BOOTING

  get state(): SessionState {
    return this._state
  }

  get isShuttingDown(): boolean {
    return this._state === SessionStates.SHUTTING_DOWN
  }

  /**
   * Check whether a transition is allowed without performing it
   */
  canMoveTo(target: SessionState): boolean {
    if (target === SessionStates.SHUTTING_DOWN) return !this.isShuttingDown
    return TRANSITIONS[this._state].includes(target)
  }

  /**
   * Move to the target state, returning the state that was left
   */
  moveTo(
    target: SessionState,
  ): Result<SessionState, InvalidStateTransitionError> {
    if (!this.canMoveTo(target)) {
      return Result.err(new InvalidStateTransitionError(this._state, target))
    }
    const previous = this._state
    this._state = target
    return Result.ok(previous)
  }
}
