import pino from "pino"
import { describe, expect, it, vi } from "vitest"
import {
  type Frame,
  OFF_FRAME,
  renderPattern,
} from "../../domain/led/services/led-frames.service"
import { Result } from "../../domain/shared/result"
import { type LedDriverPort, LedWriteError } from "../ports/led-driver.port"
import { DEFAULT_FLASH } from "../use-cases/session-orchestrator"
import { DEFAULT_LED_ANIMATOR_OPTIONS, LedAnimator } from "./led-animator"
import { LedCommandCell } from "./led-command-cell"

class FakeDriver implements LedDriverPort {
  readonly frames: Frame[] = []
  closed = false
  /** When set, writes resolve with this instead of success */
  pending: Promise<Result<void, LedWriteError>> | null = null

  write(frame: Frame): Promise<Result<void, LedWriteError>> {
    this.frames.push(frame)
    return this.pending ?? Promise.resolve(Result.ok(undefined))
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

function setup() {
  let now = 0
  const cell = new LedCommandCell()
  const driver = new FakeDriver()
  const logger = pino({ level: "silent" })
  const animator = new LedAnimator(cell, driver, logger, {
    frameIntervalMs: 33,
    unknownFlashMs: 600,
    clock: () => now,
  })
  const at = (ms: number) => {
    now = ms
  }
  return { cell, driver, logger, animator, at }
}

describe("LedAnimator", () => {
  it("writes nothing until a command is published", () => {
    const { driver, animator } = setup()
    animator.tick()
    expect(driver.frames).toEqual([])
  })

  it("renders the latest command from the time it was picked up", async () => {
    const { cell, driver, animator, at } = setup()

    at(1000)
    cell.publish("connecting")
    animator.tick()
    await flush()
    at(1500)
    animator.tick()

    expect(driver.frames).toEqual([
      renderPattern("connecting", 0),
      renderPattern("connecting", 500),
    ])
  })

  it("flashes cyan for an unknown command, then returns to the previous pattern", async () => {
    const { cell, driver, animator, at } = setup()

    cell.publish("recording")
    animator.tick()
    await flush()

    at(100)
    cell.publish("unknown")
    animator.tick()
    await flush()

    at(800)
    animator.tick()

    expect(driver.frames).toEqual([
      renderPattern("recording", 0),
      [
        { r: 0, g: 180, b: 255 },
        { r: 0, g: 180, b: 255 },
      ],
      renderPattern("recording", 800),
    ])
  })

  it("holds the cyan flash as long as the session waits before going ready", () => {
    expect(DEFAULT_LED_ANIMATOR_OPTIONS.unknownFlashMs).toBe(
      DEFAULT_FLASH.unknownMs,
    )
  })

  it("drops frames while a write is still in flight", async () => {
    const { cell, driver, animator } = setup()
    let finish: (result: Result<void, LedWriteError>) => void = () => {}
    driver.pending = new Promise((resolve) => {
      finish = resolve
    })

    cell.publish("ready")
    animator.tick()
    animator.tick()
    animator.tick()

    expect(driver.frames).toHaveLength(1)
    expect(animator.droppedFrames).toBe(2)

    finish(Result.ok(undefined))
    await flush()
    driver.pending = null
    animator.tick()
    expect(driver.frames).toHaveLength(2)
  })

  it("logs a failed write and keeps going", async () => {
    const { cell, driver, animator, logger } = setup()
    const warn = vi.spyOn(logger, "warn")
    driver.pending = Promise.resolve(Result.err(new LedWriteError("EIO")))

    cell.publish("error")
    animator.tick()
    await flush()
    animator.tick()

    expect(warn).toHaveBeenCalledWith({ err: "EIO" }, "led-write-failed")
    expect(driver.frames).toHaveLength(2)
  })

  it("logs a run of failed writes once and notes the recovery", async () => {
    const { cell, driver, animator, logger } = setup()
    const warn = vi.spyOn(logger, "warn")
    const info = vi.spyOn(logger, "info")
    driver.pending = Promise.resolve(
      Result.err(new LedWriteError("ENOENT: /dev/spidev0.0")),
    )

    cell.publish("ready")
    for (let i = 0; i < 30; i++) {
      animator.tick()
      await flush()
    }

    expect(driver.frames).toHaveLength(30)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(info).not.toHaveBeenCalled()

    driver.pending = null
    animator.tick()
    await flush()
    animator.tick()
    await flush()

    expect(info).toHaveBeenCalledTimes(1)
    expect(info).toHaveBeenCalledWith(
      { failedWrites: 30 },
      "led-write-recovered",
    )
  })

  it("blanks the strip and closes the driver on stop", async () => {
    const { cell, driver, animator } = setup()
    cell.publish("ready")
    animator.start()
    expect(animator.isRunning).toBe(true)

    await animator.stop()

    expect(animator.isRunning).toBe(false)
    expect(driver.frames.at(-1)).toEqual(OFF_FRAME)
    expect(driver.closed).toBe(true)
  })
})
