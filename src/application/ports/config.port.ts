import type { AppConfig, ConfigError } from "../../domain/config"
import type { Result } from "../../domain/shared/result"

/**
 * Port for configuration file operations.
 * Handles reading/writing config files using XDG conventions.
 */
export interface ConfigPort {
  load(): Promise<Result<AppConfig, ConfigError>>

  save(config: AppConfig): Promise<Result<void, ConfigError>>

  getPath(): string

  exists(): Promise<boolean>

  /**
   * Create config file with default values
   */
  createDefault(): Promise<Result<void, ConfigError>>

  /**
   * Get a single config value by key
   */
  getValue(
    key: string,
  ): Promise<Result<string | number | boolean | undefined, ConfigError>>

  /**
   * Validate and set a single config value by key
   */
  setValue(key: string, value: string): Promise<Result<void, ConfigError>>
}
