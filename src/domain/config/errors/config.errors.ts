import { DomainError } from "../../shared/result"

export class ConfigFileNotFoundError extends DomainError {
  readonly code = "CONFIG_FILE_NOT_FOUND"
  constructor(readonly path: string) {
    super(`Config file not found: ${path}`)
  }
}

export class ConfigParseError extends DomainError {
  readonly code = "CONFIG_PARSE_ERROR"
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(
      path
        ? `Failed to parse config file ${path}: ${message}`
        : `Failed to parse config file: ${message}`,
    )
  }
}

/**
 * A value for a known key was rejected, whichever source it came from
 */
export class ConfigValidationError extends DomainError {
  readonly code = "CONFIG_VALIDATION_ERROR"
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`Invalid config value for '${key}': ${message}`)
  }
}

export class ConfigWriteError extends DomainError {
  readonly code = "CONFIG_WRITE_ERROR"
  constructor(message: string) {
    super(`Failed to write config file: ${message}`)
  }
}

export class ConfigKeyNotFoundError extends DomainError {
  readonly code = "CONFIG_KEY_NOT_FOUND"
  constructor(
    readonly key: string,
    validKeys: readonly string[],
  ) {
    super(`Unknown config key: ${key}. Valid keys: ${validKeys.join(", ")}`)
  }
}

/**
 * A setting the runtime cannot start without is missing from every source
 */
export class EnvironmentError extends DomainError {
  readonly code = "ENVIRONMENT_ERROR"
  constructor(
    readonly key: string,
    readonly envVar: string,
  ) {
    super(
      `${key} not set. Use 'pushtalk config set ${key} <value>' ` +
        `or set the ${envVar} environment variable.`,
    )
  }
}

export type ConfigError =
  | ConfigFileNotFoundError
  | ConfigParseError
  | ConfigValidationError
  | ConfigWriteError
  | ConfigKeyNotFoundError
