import { describe, expect, it } from "vitest"
import { AppConfig } from "./app-config.vo"
import { isConfigKey, parseConfigValue } from "./config-keys.vo"

describe("parseConfigValue", () => {
  it("converts typed values into a config patch", () => {
    expect(parseConfigValue("sample_rate", "44100")).toEqual({
      ok: true,
      value: { sampleRate: 44100 },
    })
    expect(parseConfigValue("tones", "no")).toEqual({
      ok: true,
      value: { tones: false },
    })
    expect(parseConfigValue("led_brightness", "0.5")).toEqual({
      ok: true,
      value: { ledBrightness: 0.5 },
    })
    expect(parseConfigValue("upload_timeout", "90s")).toEqual({
      ok: true,
      value: { uploadTimeout: "1m30s" },
    })
  })

  it("rejects values outside their range", () => {
    const result = parseConfigValue("channels", "0")
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid config value for 'channels': must be an integer in 1..8",
      )
    }
  })

  it("only accepts http and https endpoints", () => {
    expect(parseConfigValue("endpoint", "https://relay.test/hook").ok).toBe(
      true,
    )
    expect(parseConfigValue("endpoint", "ftp://relay.test").ok).toBe(false)
    expect(parseConfigValue("endpoint", "not a url").ok).toBe(false)
  })

  it("accepts only known line biases and gpiod versions", () => {
    expect(parseConfigValue("button_bias", "Pull-Down")).toEqual({
      ok: true,
      value: { buttonBias: "pull-down" },
    })
    const bias = parseConfigValue("button_bias", "pull-sideways")
    expect(bias.ok).toBe(false)
    if (!bias.ok) {
      expect(bias.error.message).toBe(
        "Invalid config value for 'button_bias': must be one of pull-up, pull-down, disable, as-is",
      )
    }
    expect(parseConfigValue("gpiod_version", "2")).toEqual({
      ok: true,
      value: { gpiodVersion: 2 },
    })
    expect(parseConfigValue("gpiod_version", "3").ok).toBe(false)
  })

  it("knows its keys", () => {
    expect(isConfigKey("audio_device")).toBe(true)
    expect(isConfigKey("api_key")).toBe(false)
  })
})

describe("AppConfig.merge", () => {
  it("lets defined values of the other config win", () => {
    const merged = AppConfig.defaults().merge(
      AppConfig.fromPartial({ sampleRate: 16000, tones: undefined }),
    )
    expect(merged.sampleRate).toBe(16000)
    expect(merged.tones).toBe(true)
    expect(merged.audioDevice).toBe("plughw:0,0")
  })
})
