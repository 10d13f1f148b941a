import type { Result } from "../../domain/shared/result"
import type { SubprocessHandle } from "./subprocess.port"

/**
 * The audio device could not be opened, or the recorder died with it
 */
export class DeviceUnavailableError extends Error {
  readonly code = "DEVICE_UNAVAILABLE"

  constructor(message: string) {
    super(message)
    this.name = "DeviceUnavailableError"
  }
}

export type CaptureHandle = SubprocessHandle

/**
 * Port interface for the recorder process.
 * At most one handle is live at a time.
 */
export interface CapturePort {
  /**
   * Spawn a recorder writing to `path`
   */
  start(path: string): Result<CaptureHandle, DeviceUnavailableError>

  /**
   * Interrupt the recorder, force-kill it after the grace period and
   * return the size of the finalized file. Safe to call more than once.
   */
  stop(handle: CaptureHandle): Promise<Result<number, DeviceUnavailableError>>
}
