import type { Result } from "../../domain/shared/result"
import type { DeviceUnavailableError } from "./capture.port"
import type { SubprocessHandle } from "./subprocess.port"

/**
 * The player exited with a failure
 */
export class PlaybackFailedError extends Error {
  readonly code = "PLAYBACK_FAILED"

  constructor(
    message: string,
    public readonly exitCode: number | null,
  ) {
    super(message)
    this.name = "PlaybackFailedError"
  }
}

export type PlaybackHandle = SubprocessHandle

/**
 * Port interface for the player process.
 * Callers never start a second playback while one is live.
 */
export interface PlaybackPort {
  play(path: string): Result<PlaybackHandle, DeviceUnavailableError>

  /**
   * Resolve once the player exits; nonzero exit is a PlaybackFailedError
   */
  wait(handle: PlaybackHandle): Promise<Result<void, PlaybackFailedError>>

  /**
   * Terminate the player within the grace period
   */
  stop(handle: PlaybackHandle): Promise<void>
}
