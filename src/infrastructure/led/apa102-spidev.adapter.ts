import { type FileHandle, open } from "node:fs/promises"
import {
  type LedDriverPort,
  LedWriteError,
} from "../../application/ports/led-driver.port"
import type { Frame } from "../../domain/led/services/led-frames.service"
import { Result, describeError } from "../../domain/shared/result"

/**
 * Encode one frame for an APA102 strip: a zero start frame, one
 * brightness/blue/green/red word per LED and an all-ones end frame.
 * `brightness` is 0..1 and maps onto the 5-bit global brightness.
 */
export function encodeApa102(frame: Frame, brightness: number): Buffer {
  const level = Math.max(0, Math.min(31, Math.round(brightness * 31)))
  const out = Buffer.alloc(4 + frame.length * 4 + 4)

  let offset = 4
  for (const pixel of frame) {
    out[offset++] = 0xe0 | level
    out[offset++] = pixel.b
    out[offset++] = pixel.g
    out[offset++] = pixel.r
  }
  out.fill(0xff, offset)
  return out
}

/**
 * Writes frames to a spidev node. The device is opened on first use.
 */
export class Apa102SpidevAdapter implements LedDriverPort {
  private handle: FileHandle | null = null

  constructor(
    private readonly devicePath: string,
    private readonly brightness: number,
  ) {}

  async write(frame: Frame): Promise<Result<void, LedWriteError>> {
    try {
      this.handle ??= await open(this.devicePath, "w")
      await this.handle.write(encodeApa102(frame, this.brightness))
      return Result.ok(undefined)
    } catch (error) {
      return Result.err(
        new LedWriteError(
          `${this.devicePath}: ${describeError(error, "write failed")}`,
        ),
      )
    }
  }

  async close(): Promise<void> {
    const handle = this.handle
    this.handle = null
    await handle?.close()
  }
}
