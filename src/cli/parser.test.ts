import { describe, expect, it } from "vitest"
import { parseCliArgs } from "./parser"

describe("parseCliArgs", () => {
  it("runs the device with no arguments", () => {
    expect(parseCliArgs([])).toEqual({
      ok: true,
      value: { mode: "run", overrides: {} },
    })
  })

  it("turns flags into config overrides", () => {
    expect(
      parseCliArgs([
        "--verbose",
        "--no-tones",
        "--endpoint",
        "https://relay.test/hook",
      ]),
    ).toEqual({
      ok: true,
      value: {
        mode: "run",
        overrides: {
          endpoint: "https://relay.test/hook",
          verbose: true,
          tones: false,
        },
      },
    })
  })

  it("parses the check command", () => {
    const result = parseCliArgs(["check", "--endpoint", "http://10.0.0.5:5678"])
    expect(result).toEqual({
      ok: true,
      value: {
        mode: "check",
        overrides: { endpoint: "http://10.0.0.5:5678" },
      },
    })
  })

  it("lets help and version win over everything else", () => {
    expect(parseCliArgs(["check", "-h"])).toEqual({
      ok: true,
      value: { mode: "help" },
    })
    expect(parseCliArgs(["--version"])).toEqual({
      ok: true,
      value: { mode: "version" },
    })
  })

  it("rejects an invalid endpoint", () => {
    const result = parseCliArgs(["--endpoint", "ftp://relay.test"])
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid config value for 'endpoint': must be an http or https URL",
      )
    }
  })

  it("rejects unknown flags and commands", () => {
    expect(parseCliArgs(["--loud"]).ok).toBe(false)
    const result = parseCliArgs(["record"])
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe("Unexpected argument: record")
    }
  })

  it("hands config subcommands to the config parser", () => {
    expect(parseCliArgs(["config", "set", "tones", "false"])).toEqual({
      ok: true,
      value: {
        mode: "config",
        configAction: { action: "set", key: "tones", value: "false" },
      },
    })
    expect(parseCliArgs(["config"]).ok).toBe(false)
  })
})
