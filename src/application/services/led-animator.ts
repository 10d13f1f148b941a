import type { Logger } from "pino"
import {
  type Frame,
  OFF_FRAME,
  renderPattern,
} from "../../domain/led/services/led-frames.service"
import type { LedPattern } from "../../domain/led/value-objects/led-pattern.vo"
import { describeError } from "../../domain/shared/result"
import type { LedDriverPort } from "../ports/led-driver.port"
import type { LedCommandCell } from "./led-command-cell"

export interface LedAnimatorOptions {
  frameIntervalMs: number
  /** How long the cyan flash for an unknown instruction lasts */
  unknownFlashMs: number
  clock?: () => number
}

export const DEFAULT_LED_ANIMATOR_OPTIONS: LedAnimatorOptions = {
  frameIntervalMs: 33,
  unknownFlashMs: 600,
}

/**
 * Render loop for the LED strip.
 *
 * Each frame it looks at the latest command in the cell and renders the
 * matching pattern. Writes never overlap: while one is still in flight
 * the frame is dropped and counted.
 */
export class LedAnimator {
  private timer: NodeJS.Timeout | null = null
  private seenVersion = 0
  private base: { pattern: LedPattern; since: number } | null = null
  private flashSince: number | null = null
  private inFlight: Promise<void> | null = null
  private dropped = 0
  /** Failed writes since the last one that went through */
  private failures = 0
  private readonly clock: () => number

  constructor(
    private readonly cell: LedCommandCell,
    private readonly driver: LedDriverPort,
    private readonly logger: Logger,
    private readonly options: LedAnimatorOptions = DEFAULT_LED_ANIMATOR_OPTIONS,
  ) {
    this.clock = options.clock ?? (() => performance.now())
  }

  /**
   * Frames skipped because the previous write had not finished
   */
  get droppedFrames(): number {
    return this.dropped
  }

  get isRunning(): boolean {
    return this.timer !== null
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => this.tick(), this.options.frameIntervalMs)
  }

  /**
   * Render and write one frame
   */
  tick(): void {
    const now = this.clock()
    this.pickUpCommand(now)

    const frame = this.frameAt(now)
    if (!frame) return

    if (this.inFlight) {
      this.dropped++
      return
    }

    this.inFlight = this.write(frame).finally(() => {
      this.inFlight = null
    })
  }

  /**
   * Stop the loop, blank the strip and release the driver
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.inFlight
    await this.write(OFF_FRAME)
    await this.driver.close()
  }

  private pickUpCommand(now: number): void {
    const latest = this.cell.read()
    if (!latest || latest.version === this.seenVersion) return
    this.seenVersion = latest.version

    if (latest.command === "unknown") {
      this.flashSince = now
      return
    }
    this.flashSince = null
    this.base = { pattern: latest.command, since: now }
  }

  private frameAt(now: number): Frame | null {
    if (this.flashSince !== null) {
      const elapsed = now - this.flashSince
      if (elapsed < this.options.unknownFlashMs) {
        return renderPattern("unknown", elapsed)
      }
      this.flashSince = null
    }
    if (!this.base) return null
    return renderPattern(this.base.pattern, now - this.base.since)
  }

  private async write(frame: Frame): Promise<void> {
    try {
      const result = await this.driver.write(frame)
      if (result.ok) {
        this.recovered()
      } else {
        this.failed(result.error.message)
      }
    } catch (error) {
      this.failed(describeError(error, "LED write rejected"))
    }
  }

  // Only the first failure of a run is logged; a missing bus fails every frame
  private failed(message: string): void {
    this.failures++
    if (this.failures === 1) {
      this.logger.warn({ err: message }, "led-write-failed")
    }
  }

  private recovered(): void {
    if (this.failures === 0) return
    this.logger.info({ failedWrites: this.failures }, "led-write-recovered")
    this.failures = 0
  }
}
