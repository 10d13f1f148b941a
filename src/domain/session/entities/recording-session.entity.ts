import { join } from "node:path"

/**
 * How the recording was started, which decides how it ends:
 * hold mode stops on release, toggle mode stops on the next double tap.
 */
export type RecordingMode = "hold" | "toggle"

/**
 * Compact UTC stamp used in recording file names, e.g. 20261019T071502123Z
 */
function recordingStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "")
}

/**
 * One capture attempt.
 * Created on entering recording, released once its recorder is gone.
 * `H` is the handle type of whatever owns the recorder process.
 */
export class RecordingSession<H> {
  private _handle: H | null = null
  private _released = false

  private constructor(
    readonly id: string,
    readonly path: string,
    readonly mode: RecordingMode,
  ) {}

  static create<H>(
    directory: string,
    mode: RecordingMode,
    now: Date = new Date(),
  ): RecordingSession<H> {
    const id = `rec_${recordingStamp(now)}`
    return new RecordingSession<H>(id, join(directory, `${id}.wav`), mode)
  }

  get handle(): H | null {
    return this._handle
  }

  /**
   * Bind the live recorder handle. Ignored once the session is released.
   */
  attach(handle: H): boolean {
    if (this._released) return false
    this._handle = handle
    return true
  }

  /**
   * Release the session, handing back the handle that still needs stopping
   */
  release(): H | null {
    const handle = this._handle
    this._handle = null
    this._released = true
    return handle
  }
}
