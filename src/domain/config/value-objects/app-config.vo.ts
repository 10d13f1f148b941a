/**
 * Bias requested on the button line
 */
export const LINE_BIASES = ["pull-up", "pull-down", "disable", "as-is"] as const

export type LineBias = (typeof LINE_BIASES)[number]

/**
 * Raw config data structure
 */
export interface AppConfigData {
  endpoint?: string
  audioDevice?: string
  sampleRate?: number
  channels?: number
  verbose?: boolean
  tones?: boolean
  netHost?: string
  netPort?: number
  ledDevice?: string
  ledBrightness?: number
  buttonChip?: string
  buttonLine?: number
  buttonBias?: LineBias
  /** Major version of the installed libgpiod tools (1 or 2) */
  gpiodVersion?: number
  recordingsDir?: string
  logFile?: string
  uploadTimeout?: string
  fetchTimeout?: string
  maxRecording?: string
}

const FIELDS: readonly (keyof AppConfigData)[] = [
  "endpoint",
  "audioDevice",
  "sampleRate",
  "channels",
  "verbose",
  "tones",
  "netHost",
  "netPort",
  "ledDevice",
  "ledBrightness",
  "buttonChip",
  "buttonLine",
  "buttonBias",
  "gpiodVersion",
  "recordingsDir",
  "logFile",
  "uploadTimeout",
  "fetchTimeout",
  "maxRecording",
]

/**
 * Defaults that do not depend on the environment. Endpoint, network
 * probe target and file locations are derived later when unset.
 */
export const CONFIG_DEFAULTS = {
  audioDevice: "plughw:0,0",
  sampleRate: 48000,
  channels: 2,
  verbose: false,
  tones: true,
  ledDevice: "/dev/spidev0.0",
  ledBrightness: 0.25,
  buttonChip: "gpiochip0",
  buttonLine: 17,
  buttonBias: "pull-up",
  gpiodVersion: 1,
  uploadTimeout: "60s",
  fetchTimeout: "30s",
  maxRecording: "5m",
} as const satisfies AppConfigData

function copyDefined<K extends keyof AppConfigData>(
  target: AppConfigData,
  source: AppConfigData,
  key: K,
): void {
  const value = source[key]
  if (value !== undefined) target[key] = value
}

/**
 * Value object representing application configuration.
 * Immutable and supports merging with priority.
 */
export class AppConfig {
  private constructor(private readonly data: AppConfigData) {}

  /**
   * Defaults that do not depend on the environment. Endpoint, network
   * probe target and file locations are derived later when unset.
   */
  static defaults(): AppConfig {
    return new AppConfig({ ...CONFIG_DEFAULTS })
  }

  static fromPartial(data: Partial<AppConfigData>): AppConfig {
    return new AppConfig({ ...data })
  }

  /**
   * Merge this config with another, where other takes precedence.
   * Only non-undefined values from other will override this.
   */
  merge(other: AppConfig): AppConfig {
    const merged: AppConfigData = { ...this.data }
    for (const field of FIELDS) {
      copyDefined(merged, other.data, field)
    }
    return new AppConfig(merged)
  }

  get endpoint(): string | undefined {
    return this.data.endpoint
  }
  get audioDevice(): string | undefined {
    return this.data.audioDevice
  }
  get sampleRate(): number | undefined {
    return this.data.sampleRate
  }
  get channels(): number | undefined {
    return this.data.channels
  }
  get verbose(): boolean | undefined {
    return this.data.verbose
  }
  get tones(): boolean | undefined {
    return this.data.tones
  }
  get netHost(): string | undefined {
    return this.data.netHost
  }
  get netPort(): number | undefined {
    return this.data.netPort
  }
  get ledDevice(): string | undefined {
    return this.data.ledDevice
  }
  get ledBrightness(): number | undefined {
    return this.data.ledBrightness
  }
  get buttonChip(): string | undefined {
    return this.data.buttonChip
  }
  get buttonLine(): number | undefined {
    return this.data.buttonLine
  }
  get buttonBias(): LineBias | undefined {
    return this.data.buttonBias
  }
  get gpiodVersion(): number | undefined {
    return this.data.gpiodVersion
  }
  get recordingsDir(): string | undefined {
    return this.data.recordingsDir
  }
  get logFile(): string | undefined {
    return this.data.logFile
  }
  get uploadTimeout(): string | undefined {
    return this.data.uploadTimeout
  }
  get fetchTimeout(): string | undefined {
    return this.data.fetchTimeout
  }
  get maxRecording(): string | undefined {
    return this.data.maxRecording
  }

  /**
   * Get raw config data object
   */
  toObject(): AppConfigData {
    return { ...this.data }
  }
}
