import { stat } from "node:fs/promises"
import {
  type CaptureHandle,
  type CapturePort,
  DeviceUnavailableError,
} from "../../application/ports/capture.port"
import { describeExit } from "../../application/ports/subprocess.port"
import { Result, describeError } from "../../domain/shared/result"
import { ManagedProcess } from "../process/managed-process"
import { type Spawner, spawnProcess } from "../process/spawner"

export interface ArecordOptions {
  device: string
  sampleRate: number
  channels: number
  /** Time allowed for each termination step */
  graceMs?: number
}

/**
 * ALSA recorder adapter. Writes 16-bit WAV through `arecord`.
 */
export class ArecordCaptureAdapter implements CapturePort {
  private live: ManagedProcess | null = null

  constructor(
    private readonly options: ArecordOptions,
    private readonly spawner: Spawner = spawnProcess,
  ) {}

  start(path: string): Result<CaptureHandle, DeviceUnavailableError> {
    if (this.live?.isAlive) {
      return Result.err(
        new DeviceUnavailableError(
          `Recorder already running (pid ${this.live.pid})`,
        ),
      )
    }

    // -D: ALSA device, -f: sample format, -c: channels, -r: rate
    const args = [
      "-q",
      "-D",
      this.options.device,
      "-f",
      "S16_LE",
      "-c",
      String(this.options.channels),
      "-r",
      String(this.options.sampleRate),
      "-t",
      "wav",
      path,
    ]

    try {
      this.live = new ManagedProcess(path, this.spawner("arecord", args))
      return Result.ok(this.live)
    } catch (error) {
      return Result.err(
        new DeviceUnavailableError(
          `Cannot start arecord on ${this.options.device}: ${describeError(error, "spawn failed")}`,
        ),
      )
    }
  }

  async stop(
    handle: CaptureHandle,
  ): Promise<Result<number, DeviceUnavailableError>> {
    if (!(handle instanceof ManagedProcess)) {
      return Result.err(new DeviceUnavailableError("Unknown recorder handle"))
    }

    // SIGINT lets arecord finish the WAV header
    const exit = await handle.terminate("SIGINT", this.options.graceMs ?? 2000)
    if (this.live === handle) this.live = null

    if (exit.error && exit.code === null && exit.signal === null) {
      return Result.err(
        new DeviceUnavailableError(`Recorder failed: ${describeExit(exit)}`),
      )
    }

    try {
      const info = await stat(handle.path)
      return Result.ok(info.size)
    } catch (error) {
      return Result.err(
        new DeviceUnavailableError(
          `Recording was not written (${describeExit(exit)}): ${describeError(error, "missing file")}`,
        ),
      )
    }
  }
}
