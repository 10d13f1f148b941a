import type { ConfigPort } from "../../application/ports/config.port"
import {
  AppConfig,
  type AppConfigData,
  CONFIG_DEFAULTS,
  CONFIG_ENV,
  CONFIG_KEYS,
  type ConfigError,
  ConfigPath,
  type LineBias,
  EnvironmentError,
  parseConfigValue,
} from "../../domain/config"
import { Duration } from "../../domain/recording/value-objects/duration.vo"
import { Result } from "../../domain/shared/result"

/**
 * Fully resolved settings the runtime is wired from
 */
export interface RuntimeSettings {
  endpoint: string
  audioDevice: string
  sampleRate: number
  channels: number
  verbose: boolean
  tones: boolean
  netHost: string
  netPort: number
  /** null when LEDs are disabled with `none` */
  ledDevice: string | null
  ledBrightness: number
  buttonChip: string
  buttonLine: number
  buttonBias: LineBias
  gpiodVersion: 1 | 2
  recordingsDir: string
  logFile: string
  uploadTimeout: Duration
  fetchTimeout: Duration
  maxRecording: Duration
}

function durationOr(value: string | undefined, fallback: string): Duration {
  return Result.unwrapOr(
    Duration.parse(value ?? fallback),
    Result.unwrapOr(Duration.parse(fallback), Duration.fromMilliseconds(1000)),
  )
}

function endpointTarget(endpoint: string): { host: string; port: number } {
  const url = new URL(endpoint)
  const port = url.port
    ? Number.parseInt(url.port, 10)
    : url.protocol === "https:"
      ? 443
      : 80
  return { host: url.hostname, port }
}

/**
 * Service that orchestrates config loading from multiple sources.
 * Handles priority: CLI args > env vars > config file > defaults
 */
export class ConfigService {
  constructor(
    private readonly configAdapter: ConfigPort,
    private readonly cliOptions?: Partial<AppConfigData>,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Load configuration with priority merging.
   * A broken config file or environment value fails the load.
   */
  async loadMergedConfig(): Promise<
    Result<AppConfig, ConfigError | EnvironmentError>
  > {
    let config = AppConfig.defaults()

    if (await this.configAdapter.exists()) {
      const fileResult = await this.configAdapter.load()
      if (!fileResult.ok) return fileResult
      config = config.merge(fileResult.value)
    }

    const envResult = this.loadEnvConfig()
    if (!envResult.ok) return envResult
    config = config.merge(envResult.value)

    if (this.cliOptions) {
      config = config.merge(AppConfig.fromPartial(this.cliOptions))
    }

    if (!config.endpoint) {
      return Result.err(new EnvironmentError("endpoint", CONFIG_ENV.endpoint))
    }

    return Result.ok(config)
  }

  /**
   * Merge all sources and derive everything left unset
   */
  async loadSettings(): Promise<
    Result<RuntimeSettings, ConfigError | EnvironmentError>
  > {
    const merged = await this.loadMergedConfig()
    if (!merged.ok) return merged
    return this.resolve(merged.value)
  }

  private resolve(
    config: AppConfig,
  ): Result<RuntimeSettings, EnvironmentError> {
    const endpoint = config.endpoint
    if (!endpoint) {
      return Result.err(new EnvironmentError("endpoint", CONFIG_ENV.endpoint))
    }
    const target = endpointTarget(endpoint)
    const ledDevice = config.ledDevice ?? CONFIG_DEFAULTS.ledDevice

    return Result.ok({
      endpoint,
      audioDevice: config.audioDevice ?? CONFIG_DEFAULTS.audioDevice,
      sampleRate: config.sampleRate ?? CONFIG_DEFAULTS.sampleRate,
      channels: config.channels ?? CONFIG_DEFAULTS.channels,
      verbose: config.verbose ?? CONFIG_DEFAULTS.verbose,
      tones: config.tones ?? CONFIG_DEFAULTS.tones,
      netHost: config.netHost ?? target.host,
      netPort: config.netPort ?? target.port,
      ledDevice: ledDevice.toLowerCase() === "none" ? null : ledDevice,
      ledBrightness: config.ledBrightness ?? CONFIG_DEFAULTS.ledBrightness,
      buttonChip: config.buttonChip ?? CONFIG_DEFAULTS.buttonChip,
      buttonLine: config.buttonLine ?? CONFIG_DEFAULTS.buttonLine,
      buttonBias: config.buttonBias ?? CONFIG_DEFAULTS.buttonBias,
      gpiodVersion: config.gpiodVersion === 2 ? 2 : 1,
      recordingsDir: config.recordingsDir ?? ConfigPath.defaultRecordingsDir(),
      logFile: config.logFile ?? ConfigPath.defaultLogFile(),
      uploadTimeout: durationOr(
        config.uploadTimeout,
        CONFIG_DEFAULTS.uploadTimeout,
      ),
      fetchTimeout: durationOr(
        config.fetchTimeout,
        CONFIG_DEFAULTS.fetchTimeout,
      ),
      maxRecording: durationOr(
        config.maxRecording,
        CONFIG_DEFAULTS.maxRecording,
      ),
    })
  }

  /**
   * Load config values from environment variables.
   * DEBUG=1 turns on verbose logging unless PUSHTALK_VERBOSE says otherwise.
   */
  private loadEnvConfig(): Result<AppConfig, ConfigError> {
    let data: Partial<AppConfigData> = {}
    if (this.env.DEBUG === "1") data.verbose = true

    for (const key of CONFIG_KEYS) {
      const raw = this.env[CONFIG_ENV[key]]
      if (raw === undefined || raw.trim() === "") continue
      const parsed = parseConfigValue(key, raw)
      if (!parsed.ok) return parsed
      data = { ...data, ...parsed.value }
    }

    return Result.ok(AppConfig.fromPartial(data))
  }
}
