import { parseArgs } from "node:util"
import { type AppConfigData, parseConfigValue } from "../domain/config"
import { Result } from "../domain/shared/result"
import { type ConfigCliOptions, parseConfigArgs } from "./config-parser"

/**
 * POSIX exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE_ERROR: 2,
  INTERRUPTED: 130,
} as const

/**
 * Options for running the device runtime. Flags only carry what the
 * user passed; everything else comes from the config sources.
 */
export interface RunCliOptions {
  mode: "run"
  overrides: Partial<AppConfigData>
}

/**
 * Single reachability probe against the configured endpoint host
 */
export interface CheckCliOptions {
  mode: "check"
  overrides: Partial<AppConfigData>
}

export type ParsedCliOptions =
  | RunCliOptions
  | CheckCliOptions
  | ConfigCliOptions
  | { mode: "help" }
  | { mode: "version" }

/**
 * CLI parsing error
 */
export class CliParseError extends Error {
  readonly code = "CLI_PARSE_ERROR"

  constructor(message: string) {
    super(message)
    this.name = "CliParseError"
  }
}

export const VERSION = "0.1.0"

/**
 * Help text
 */
export function getHelpText(): string {
  return `
pushtalk - push-to-talk voice relay for a button, LEDs and a sound card

USAGE:
    pushtalk [OPTIONS]
    pushtalk check [OPTIONS]
    pushtalk config <COMMAND>

OPTIONS:
    --endpoint <URL>     Endpoint that receives recordings
    --verbose            Log at debug level
    --no-tones           Disable sound cues
    -h, --help           Show this help message
    -v, --version        Show version

BUTTON:
    hold                 Record while held, upload on release
    double tap           Start recording, double tap again to upload

CONFIG COMMANDS:
    pushtalk config init              Create config file with defaults
    pushtalk config set <key> <value> Set a config value
    pushtalk config get <key>         Get a config value
    pushtalk config list              List all config values
    pushtalk config path              Show config file path

CONFIG FILE:
    Location: $XDG_CONFIG_HOME/pushtalk/config.toml
              (default: ~/.config/pushtalk/config.toml)

PRIORITY:
    CLI arguments > Environment variables (PUSHTALK_*) > Config file > Defaults

SIGNALS:
    SIGUSR1          Same as a double tap
    SIGINT/SIGTERM   Finish cleanly (a second one exits at once)

LOGS:
    JSON lines on stdout and in log_file
    (default: $XDG_STATE_HOME/pushtalk/pushtalk.log)
`.trim()
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(
  argv: string[],
): Result<ParsedCliOptions, CliParseError> {
  if (argv[0] === "config") {
    return parseConfigArgs(argv.slice(1))
  }

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        endpoint: { type: "string" },
        verbose: { type: "boolean", default: false },
        "no-tones": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "v", default: false },
      },
      strict: true,
      allowPositionals: true,
    })

    if (values.help) return Result.ok({ mode: "help" })
    if (values.version) return Result.ok({ mode: "version" })

    const command = positionals[0]
    if (positionals.length > 1 || (command && command !== "check")) {
      return Result.err(
        new CliParseError(`Unexpected argument: ${positionals.join(" ")}`),
      )
    }

    const overrides: Partial<AppConfigData> = {}
    if (values.endpoint !== undefined) {
      const endpoint = parseConfigValue("endpoint", values.endpoint)
      if (!endpoint.ok) {
        return Result.err(new CliParseError(endpoint.error.message))
      }
      Object.assign(overrides, endpoint.value)
    }
    if (values.verbose) overrides.verbose = true
    if (values["no-tones"]) overrides.tones = false

    if (command === "check") return Result.ok({ mode: "check", overrides })
    return Result.ok({ mode: "run", overrides })
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown argument parsing error"
    return Result.err(new CliParseError(message))
  }
}
