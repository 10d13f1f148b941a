import { existsSync, readFileSync } from "node:fs"
import { mkdtemp, readdir, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import pino from "pino"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { Result } from "../../domain/shared/result"
import { DeviceUnavailableError } from "../ports/capture.port"
import {
  PlaybackFailedError,
  type PlaybackHandle,
  type PlaybackPort,
} from "../ports/playback.port"
import type { ProcessExit } from "../ports/subprocess.port"
import { CuePlayer } from "./cue-player"

interface Played {
  path: string
  header: string
  bytes: number
}

class FakePlayer implements PlaybackPort {
  readonly played: Played[] = []
  exitCode = 0
  /** Keep players running until stop() */
  hold = false
  failSpawn = false
  private finishers: Array<(exit: ProcessExit) => void> = []

  play(path: string): Result<PlaybackHandle, DeviceUnavailableError> {
    if (this.failSpawn) return Result.err(new DeviceUnavailableError("busy"))
    const data = readFileSync(path)
    this.played.push({
      path,
      header: data.subarray(0, 4).toString("ascii"),
      bytes: data.length,
    })

    let finish: (exit: ProcessExit) => void = () => {}
    const exited = new Promise<ProcessExit>((resolve) => {
      finish = resolve
    })
    this.finishers.push(finish)
    if (!this.hold) finish({ code: this.exitCode, signal: null, stderr: "" })
    return Result.ok({ path, pid: 1, isAlive: true, exited })
  }

  async wait(
    handle: PlaybackHandle,
  ): Promise<Result<void, PlaybackFailedError>> {
    const exit = await handle.exited
    return exit.code === 0
      ? Result.ok(undefined)
      : Result.err(new PlaybackFailedError("aplay failed", exit.code))
  }

  async stop(): Promise<void> {
    for (const finish of this.finishers) {
      finish({ code: null, signal: "SIGTERM", stderr: "" })
    }
  }
}

describe("CuePlayer", () => {
  let dir = ""
  const logger = pino({ level: "silent" })

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pushtalk-cue-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function player(playback: PlaybackPort, enabled = true) {
    return new CuePlayer(playback, logger, {
      enabled,
      sampleRate: 8000,
      tempDir: dir,
    })
  }

  it("plays queued cues in order as WAV files and removes them", async () => {
    const playback = new FakePlayer()
    const cues = player(playback)

    cues.play("activate")
    cues.play("release")
    await cues.drain()

    expect(playback.played.map((entry) => entry.header)).toEqual(["RIFF", "RIFF"])
    expect(playback.played[0].path).toMatch(/_activate\.wav$/)
    expect(playback.played[1].path).toMatch(/_release\.wav$/)
    expect(playback.played.every((entry) => !existsSync(entry.path))).toBe(true)
    expect(await readdir(dir)).toEqual([])
  })

  it("renders server steps", async () => {
    const playback = new FakePlayer()
    const cues = player(playback)

    cues.playSteps("server", [{ fL: 440, fR: 440, duration: 0.01, volume: 0.5 }])
    await cues.drain()

    // 44-byte header, 80 frames of tone and 80 frames of spacer at 8 kHz
    expect(playback.played).toEqual([
      expect.objectContaining({ header: "RIFF", bytes: 684 }),
    ])
  })

  it("does nothing when disabled", async () => {
    const playback = new FakePlayer()
    const cues = player(playback, false)

    cues.play("startup")
    await cues.drain()

    expect(cues.enabled).toBe(false)
    expect(playback.played).toEqual([])
  })

  it("logs a failing cue and carries on with the next", async () => {
    const playback = new FakePlayer()
    playback.exitCode = 1
    const warn = vi.spyOn(logger, "warn")
    const cues = player(playback)

    cues.play("response")
    cues.play("outro")
    await cues.drain()

    expect(playback.played).toHaveLength(2)
    expect(warn).toHaveBeenCalledWith(
      { cue: "response", err: "aplay failed" },
      "cue-failed",
    )
  })

  it("logs a cue whose player cannot start", async () => {
    const playback = new FakePlayer()
    playback.failSpawn = true
    const warn = vi.spyOn(logger, "warn")
    const cues = player(playback)

    cues.play("activate")
    await cues.drain()

    expect(warn).toHaveBeenCalledWith({ cue: "activate", err: "busy" }, "cue-failed")
    expect(await readdir(dir)).toEqual([])
  })

  it("cuts the running cue short and skips queued ones on stop", async () => {
    const playback = new FakePlayer()
    playback.hold = true
    const cues = player(playback)

    cues.play("startup")
    cues.play("activate")
    await vi.waitFor(() => expect(playback.played).toHaveLength(1))

    await cues.stop()
    await cues.drain()

    expect(playback.played).toHaveLength(1)

    playback.hold = false
    cues.play("outro")
    await cues.drain()
    expect(playback.played).toHaveLength(2)
  })
})
