import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { FakeChild } from "../../test/fake-child"
import { ArecordCaptureAdapter } from "./arecord-capture.adapter"

describe("ArecordCaptureAdapter", () => {
  let dir = ""
  let child: FakeChild
  const spawner = vi.fn((_command: string, _args: readonly string[]) => child)

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pushtalk-rec-"))
    child = new FakeChild()
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function adapter(graceMs = 50) {
    return new ArecordCaptureAdapter(
      { device: "plughw:1,0", sampleRate: 16000, channels: 1, graceMs },
      spawner,
    )
  }

  it("spawns arecord for the configured device and format", () => {
    const path = join(dir, "rec.wav")
    const result = adapter().start(path)

    expect(result.ok).toBe(true)
    expect(spawner).toHaveBeenCalledWith("arecord", [
      "-q",
      "-D",
      "plughw:1,0",
      "-f",
      "S16_LE",
      "-c",
      "1",
      "-r",
      "16000",
      "-t",
      "wav",
      path,
    ])
  })

  it("refuses a second recorder while one is live", () => {
    const capture = adapter()
    capture.start(join(dir, "a.wav"))

    const second = capture.start(join(dir, "b.wav"))

    expect(second.ok).toBe(false)
    if (!second.ok) expect(second.error.code).toBe("DEVICE_UNAVAILABLE")
  })

  it("interrupts the recorder and reports the file size", async () => {
    const path = join(dir, "rec.wav")
    await writeFile(path, Buffer.alloc(1044))
    const capture = adapter()
    const started = capture.start(path)
    if (!started.ok) throw started.error

    const stopped = await capture.stop(started.value)

    expect(child.signals).toEqual(["SIGINT"])
    expect(stopped).toEqual({ ok: true, value: 1044 })
    expect(started.value.isAlive).toBe(false)
  })

  it("force-kills a recorder that ignores the interrupt", async () => {
    const path = join(dir, "rec.wav")
    await writeFile(path, Buffer.alloc(44))
    child.exitOn = ["SIGKILL"]
    const capture = adapter(10)
    const started = capture.start(path)
    if (!started.ok) throw started.error

    const stopped = await capture.stop(started.value)

    expect(child.signals).toEqual(["SIGINT", "SIGKILL"])
    expect(stopped.ok).toBe(true)
  })

  it("is safe to stop twice", async () => {
    const path = join(dir, "rec.wav")
    await writeFile(path, Buffer.alloc(44))
    const capture = adapter()
    const started = capture.start(path)
    if (!started.ok) throw started.error

    await capture.stop(started.value)
    const again = await capture.stop(started.value)

    expect(child.signals).toEqual(["SIGINT"])
    expect(again).toEqual({ ok: true, value: 44 })
  })

  it("reports a recorder that could not be spawned", async () => {
    const capture = adapter()
    const started = capture.start(join(dir, "rec.wav"))
    if (!started.ok) throw started.error
    child.fail(new Error("spawn arecord ENOENT"))

    const stopped = await capture.stop(started.value)

    expect(stopped.ok).toBe(false)
    if (!stopped.ok) {
      expect(stopped.error.message).toBe("Recorder failed: spawn arecord ENOENT")
    }
  })

  it("reports a recording that was never written", async () => {
    const capture = adapter()
    const started = capture.start(join(dir, "missing.wav"))
    if (!started.ok) throw started.error

    const stopped = await capture.stop(started.value)

    expect(stopped.ok).toBe(false)
    if (!stopped.ok) {
      expect(stopped.error.message).toMatch(
        /^Recording was not written \(signal SIGINT\): /,
      )
    }
  })
})
