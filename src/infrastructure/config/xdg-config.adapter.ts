import { access, mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { type JsonMap, parse, stringify } from "@iarna/toml"
import type { ConfigPort } from "../../application/ports/config.port"
import {
  AppConfig,
  type AppConfigData,
  CONFIG_FIELDS,
  CONFIG_KEYS,
  type ConfigError,
  ConfigFileNotFoundError,
  ConfigKeyNotFoundError,
  ConfigParseError,
  ConfigPath,
  ConfigValidationError,
  ConfigWriteError,
  isConfigKey,
  parseConfigValue,
} from "../../domain/config"
import { describeError, Result } from "../../domain/shared/result"

type ConfigValue = string | number | boolean

function isScalar(value: unknown): value is ConfigValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  )
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  )
}

/**
 * Adapter for the XDG TOML config file. Keys are flat and snake_case;
 * every value goes through the same validation as `config set`.
 */
export class XdgConfigAdapter implements ConfigPort {
  constructor(
    private readonly configPath: string = ConfigPath.getConfigFilePath(),
  ) {}

  getPath(): string {
    return this.configPath
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.configPath)
      return true
    } catch {
      return false
    }
  }

  async load(): Promise<Result<AppConfig, ConfigError>> {
    let content: string
    try {
      content = await readFile(this.configPath, "utf8")
    } catch (error) {
      if (isMissingFile(error)) {
        return Result.err(new ConfigFileNotFoundError(this.configPath))
      }
      return Result.err(
        new ConfigParseError(
          describeError(error, "unreadable file"),
          this.configPath,
        ),
      )
    }

    let raw: JsonMap
    try {
      raw = parse(content)
    } catch (error) {
      return Result.err(
        new ConfigParseError(
          describeError(error, "invalid TOML"),
          this.configPath,
        ),
      )
    }

    return this.fromToml(raw)
  }

  private fromToml(raw: JsonMap): Result<AppConfig, ConfigError> {
    let data: Partial<AppConfigData> = {}

    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) {
        return Result.err(new ConfigKeyNotFoundError(key, CONFIG_KEYS))
      }
      if (!isScalar(value)) {
        return Result.err(
          new ConfigValidationError(key, "must be a string, number or boolean"),
        )
      }
      const parsed = parseConfigValue(key, String(value))
      if (!parsed.ok) return parsed
      data = { ...data, ...parsed.value }
    }

    return Result.ok(AppConfig.fromPartial(data))
  }

  async save(config: AppConfig): Promise<Result<void, ConfigError>> {
    const data = config.toObject()
    const toml: JsonMap = {}
    for (const key of CONFIG_KEYS) {
      const value = data[CONFIG_FIELDS[key]]
      if (value !== undefined) toml[key] = value
    }

    try {
      await mkdir(dirname(this.configPath), { recursive: true })
      await writeFile(this.configPath, stringify(toml), "utf8")
      return Result.ok(undefined)
    } catch (error) {
      return Result.err(
        new ConfigWriteError(describeError(error, "Unknown error")),
      )
    }
  }

  async createDefault(): Promise<Result<void, ConfigError>> {
    return this.save(AppConfig.defaults())
  }

  async getValue(
    key: string,
  ): Promise<Result<ConfigValue | undefined, ConfigError>> {
    if (!isConfigKey(key)) {
      return Result.err(new ConfigKeyNotFoundError(key, CONFIG_KEYS))
    }

    const loadResult = await this.load()
    if (!loadResult.ok) {
      // A missing file just means nothing is set yet
      if (loadResult.error.code === "CONFIG_FILE_NOT_FOUND") {
        return Result.ok(undefined)
      }
      return loadResult
    }

    return Result.ok(loadResult.value.toObject()[CONFIG_FIELDS[key]])
  }

  async setValue(
    key: string,
    value: string,
  ): Promise<Result<void, ConfigError>> {
    if (!isConfigKey(key)) {
      return Result.err(new ConfigKeyNotFoundError(key, CONFIG_KEYS))
    }

    const patch = parseConfigValue(key, value)
    if (!patch.ok) return patch

    let config: AppConfig
    const loadResult = await this.load()
    if (loadResult.ok) {
      config = loadResult.value
    } else if (loadResult.error.code === "CONFIG_FILE_NOT_FOUND") {
      config = AppConfig.fromPartial({})
    } else {
      return loadResult
    }

    return this.save(config.merge(AppConfig.fromPartial(patch.value)))
  }
}
