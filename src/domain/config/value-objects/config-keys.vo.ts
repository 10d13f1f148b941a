import { Duration } from "../../recording/value-objects/duration.vo"
import { Result } from "../../shared/result"
import { ConfigValidationError } from "../errors/config.errors"
import { type AppConfigData, LINE_BIASES } from "./app-config.vo"

/**
 * User-facing config keys (TOML file and `config set/get`)
 */
export const CONFIG_KEYS = [
  "endpoint",
  "audio_device",
  "sample_rate",
  "channels",
  "verbose",
  "tones",
  "net_host",
  "net_port",
  "led_device",
  "led_brightness",
  "button_chip",
  "button_line",
  "button_bias",
  "gpiod_version",
  "recordings_dir",
  "log_file",
  "upload_timeout",
  "fetch_timeout",
  "max_recording",
] as const

export type ConfigKey = (typeof CONFIG_KEYS)[number]

/**
 * Field of AppConfigData each key maps to
 */
export const CONFIG_FIELDS: Record<ConfigKey, keyof AppConfigData> = {
  endpoint: "endpoint",
  audio_device: "audioDevice",
  sample_rate: "sampleRate",
  channels: "channels",
  verbose: "verbose",
  tones: "tones",
  net_host: "netHost",
  net_port: "netPort",
  led_device: "ledDevice",
  led_brightness: "ledBrightness",
  button_chip: "buttonChip",
  button_line: "buttonLine",
  button_bias: "buttonBias",
  gpiod_version: "gpiodVersion",
  recordings_dir: "recordingsDir",
  log_file: "logFile",
  upload_timeout: "uploadTimeout",
  fetch_timeout: "fetchTimeout",
  max_recording: "maxRecording",
}

/**
 * Environment variable each key can be set through
 */
export const CONFIG_ENV: Record<ConfigKey, string> = {
  endpoint: "PUSHTALK_ENDPOINT",
  audio_device: "PUSHTALK_AUDIO_DEV",
  sample_rate: "PUSHTALK_RATE",
  channels: "PUSHTALK_CHANNELS",
  verbose: "PUSHTALK_VERBOSE",
  tones: "PUSHTALK_TONES",
  net_host: "PUSHTALK_NET_HOST",
  net_port: "PUSHTALK_NET_PORT",
  led_device: "PUSHTALK_LED_DEVICE",
  led_brightness: "PUSHTALK_LED_BRIGHTNESS",
  button_chip: "PUSHTALK_BUTTON_CHIP",
  button_line: "PUSHTALK_BUTTON_LINE",
  button_bias: "PUSHTALK_BUTTON_BIAS",
  gpiod_version: "PUSHTALK_GPIOD_VERSION",
  recordings_dir: "PUSHTALK_RECORDINGS_DIR",
  log_file: "PUSHTALK_LOG_FILE",
  upload_timeout: "PUSHTALK_UPLOAD_TIMEOUT",
  fetch_timeout: "PUSHTALK_FETCH_TIMEOUT",
  max_recording: "PUSHTALK_MAX_RECORDING",
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key)
}

type Parsed<T> = Result<T, ConfigValidationError>

function parseBoolean(key: ConfigKey, raw: string): Parsed<boolean> {
  const lower = raw.trim().toLowerCase()
  if (lower === "true" || lower === "1" || lower === "yes") {
    return Result.ok(true)
  }
  if (lower === "false" || lower === "0" || lower === "no") {
    return Result.ok(false)
  }
  return Result.err(new ConfigValidationError(key, "must be 'true' or 'false'"))
}

function parseInteger(
  key: ConfigKey,
  raw: string,
  min: number,
  max: number,
): Parsed<number> {
  const value = Number(raw.trim())
  if (!Number.isInteger(value) || value < min || value > max) {
    return Result.err(
      new ConfigValidationError(key, `must be an integer in ${min}..${max}`),
    )
  }
  return Result.ok(value)
}

function parseFraction(key: ConfigKey, raw: string): Parsed<number> {
  const value = Number(raw.trim())
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0 || value > 1) {
    return Result.err(new ConfigValidationError(key, "must be between 0 and 1"))
  }
  return Result.ok(value)
}

function parseText(key: ConfigKey, raw: string): Parsed<string> {
  const value = raw.trim()
  if (value === "") {
    return Result.err(new ConfigValidationError(key, "must not be empty"))
  }
  return Result.ok(value)
}

function parseUrl(key: ConfigKey, raw: string): Parsed<string> {
  const value = raw.trim()
  if (!URL.canParse(value)) {
    return Result.err(new ConfigValidationError(key, "must be a URL"))
  }
  const protocol = new URL(value).protocol
  if (protocol !== "https:" && protocol !== "http:") {
    return Result.err(
      new ConfigValidationError(key, "must be an http or https URL"),
    )
  }
  return Result.ok(value)
}

function parseChoice<T extends string>(
  key: ConfigKey,
  raw: string,
  choices: readonly T[],
): Parsed<T> {
  const value = raw.trim().toLowerCase()
  const match = choices.find((choice) => choice === value)
  if (match === undefined) {
    return Result.err(
      new ConfigValidationError(key, `must be one of ${choices.join(", ")}`),
    )
  }
  return Result.ok(match)
}

function parseDuration(key: ConfigKey, raw: string): Parsed<string> {
  const result = Duration.parse(raw)
  if (!result.ok) {
    return Result.err(new ConfigValidationError(key, result.error.message))
  }
  return Result.ok(result.value.toString())
}

/**
 * Validate a raw string for a key and return the config patch it produces
 */
export function parseConfigValue(
  key: ConfigKey,
  raw: string,
): Parsed<Partial<AppConfigData>> {
  switch (key) {
    case "endpoint":
      return Result.map(parseUrl(key, raw), (endpoint) => ({ endpoint }))
    case "audio_device":
      return Result.map(parseText(key, raw), (audioDevice) => ({
        audioDevice,
      }))
    case "sample_rate":
      return Result.map(parseInteger(key, raw, 8000, 192000), (sampleRate) => ({
        sampleRate,
      }))
    case "channels":
      return Result.map(parseInteger(key, raw, 1, 8), (channels) => ({
        channels,
      }))
    case "verbose":
      return Result.map(parseBoolean(key, raw), (verbose) => ({ verbose }))
    case "tones":
      return Result.map(parseBoolean(key, raw), (tones) => ({ tones }))
    case "net_host":
      return Result.map(parseText(key, raw), (netHost) => ({ netHost }))
    case "net_port":
      return Result.map(parseInteger(key, raw, 1, 65535), (netPort) => ({
        netPort,
      }))
    case "led_device":
      return Result.map(parseText(key, raw), (ledDevice) => ({ ledDevice }))
    case "led_brightness":
      return Result.map(parseFraction(key, raw), (ledBrightness) => ({
        ledBrightness,
      }))
    case "button_chip":
      return Result.map(parseText(key, raw), (buttonChip) => ({ buttonChip }))
    case "button_line":
      return Result.map(parseInteger(key, raw, 0, 1023), (buttonLine) => ({
        buttonLine,
      }))
    case "button_bias":
      return Result.map(
        parseChoice(key, raw, LINE_BIASES),
        (buttonBias) => ({ buttonBias }),
      )
    case "gpiod_version":
      return Result.map(parseInteger(key, raw, 1, 2), (gpiodVersion) => ({
        gpiodVersion,
      }))
    case "recordings_dir":
      return Result.map(parseText(key, raw), (recordingsDir) => ({
        recordingsDir,
      }))
    case "log_file":
      return Result.map(parseText(key, raw), (logFile) => ({ logFile }))
    case "upload_timeout":
      return Result.map(parseDuration(key, raw), (uploadTimeout) => ({
        uploadTimeout,
      }))
    case "fetch_timeout":
      return Result.map(parseDuration(key, raw), (fetchTimeout) => ({
        fetchTimeout,
      }))
    case "max_recording":
      return Result.map(parseDuration(key, raw), (maxRecording) => ({
        maxRecording,
      }))
  }
}
