import { DeviceUnavailableError } from "../../application/ports/capture.port"
import {
  PlaybackFailedError,
  type PlaybackHandle,
  type PlaybackPort,
} from "../../application/ports/playback.port"
import { describeExit } from "../../application/ports/subprocess.port"
import { Result, describeError } from "../../domain/shared/result"
import { ManagedProcess } from "../process/managed-process"
import { type Spawner, spawnProcess } from "../process/spawner"

export interface AplayOptions {
  device: string
  graceMs?: number
}

/**
 * ALSA player adapter. Cues and response audio share it, so at most
 * one `aplay` runs at a time.
 */
export class AplayPlaybackAdapter implements PlaybackPort {
  private live: ManagedProcess | null = null

  constructor(
    private readonly options: AplayOptions,
    private readonly spawner: Spawner = spawnProcess,
  ) {}

  play(path: string): Result<PlaybackHandle, DeviceUnavailableError> {
    if (this.live?.isAlive) {
      return Result.err(
        new DeviceUnavailableError(
          `Player already running (pid ${this.live.pid})`,
        ),
      )
    }

    try {
      const child = this.spawner("aplay", [
        "-q",
        "-D",
        this.options.device,
        path,
      ])
      this.live = new ManagedProcess(path, child)
      return Result.ok(this.live)
    } catch (error) {
      return Result.err(
        new DeviceUnavailableError(
          `Cannot start aplay on ${this.options.device}: ${describeError(error, "spawn failed")}`,
        ),
      )
    }
  }

  async wait(
    handle: PlaybackHandle,
  ): Promise<Result<void, PlaybackFailedError>> {
    const exit = await handle.exited
    if (this.live === handle) this.live = null

    if (exit.code === 0) return Result.ok(undefined)
    return Result.err(
      new PlaybackFailedError(`aplay failed: ${describeExit(exit)}`, exit.code),
    )
  }

  async stop(handle: PlaybackHandle): Promise<void> {
    if (handle instanceof ManagedProcess) {
      await handle.terminate("SIGTERM", this.options.graceMs ?? 1000)
    }
    if (this.live === handle) this.live = null
  }
}
