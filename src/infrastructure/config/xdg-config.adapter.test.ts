import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { XdgConfigAdapter } from "./xdg-config.adapter"

describe("XdgConfigAdapter", () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pushtalk-config-"))
    path = join(dir, "nested", "config.toml")
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("reports a missing file", async () => {
    const adapter = new XdgConfigAdapter(path)
    expect(await adapter.exists()).toBe(false)
    const result = await adapter.load()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe("CONFIG_FILE_NOT_FOUND")
  })

  it("sets values into a new file and reads them back", async () => {
    const adapter = new XdgConfigAdapter(path)
    expect(
      (await adapter.setValue("endpoint", "https://relay.test/hook")).ok,
    ).toBe(true)
    expect((await adapter.setValue("sample_rate", "16000")).ok).toBe(true)
    expect((await adapter.setValue("tones", "false")).ok).toBe(true)

    expect(await adapter.getValue("endpoint")).toEqual({
      ok: true,
      value: "https://relay.test/hook",
    })
    expect(await adapter.getValue("sample_rate")).toEqual({
      ok: true,
      value: 16000,
    })
    expect(await adapter.getValue("tones")).toEqual({ ok: true, value: false })
    expect(await adapter.getValue("channels")).toEqual({
      ok: true,
      value: undefined,
    })

    const text = await readFile(path, "utf8")
    expect(text).toContain('endpoint = "https://relay.test/hook"')
  })

  it("rejects unknown keys and invalid values", async () => {
    const adapter = new XdgConfigAdapter(path)
    const unknown = await adapter.setValue("api_key", "x")
    expect(unknown.ok).toBe(false)
    if (!unknown.ok) expect(unknown.error.code).toBe("CONFIG_KEY_NOT_FOUND")

    const invalid = await adapter.setValue("max_recording", "forever")
    expect(invalid.ok).toBe(false)
    if (!invalid.ok) expect(invalid.error.code).toBe("CONFIG_VALIDATION_ERROR")
    expect(await adapter.exists()).toBe(false)
  })

  it("validates every value of a hand-written file", async () => {
    const adapter = new XdgConfigAdapter(path)
    await adapter.createDefault()
    await writeFile(path, 'endpoint = "https://relay.test"\nchannels = 0\n')
    const result = await adapter.load()
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid config value for 'channels': must be an integer in 1..8",
      )
    }
  })

  it("fails on malformed TOML", async () => {
    const adapter = new XdgConfigAdapter(path)
    await adapter.createDefault()
    await writeFile(path, "endpoint = \n")
    const result = await adapter.load()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe("CONFIG_PARSE_ERROR")
  })

  it("writes the defaults with createDefault", async () => {
    const adapter = new XdgConfigAdapter(path)
    expect((await adapter.createDefault()).ok).toBe(true)
    const result = await adapter.load()
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.audioDevice).toBe("plughw:0,0")
    expect(result.value.ledBrightness).toBe(0.25)
    expect(result.value.maxRecording).toBe("5m")
    expect(result.value.endpoint).toBeUndefined()
  })
})
