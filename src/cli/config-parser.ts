import { Result } from "../domain/shared/result"
import { CliParseError } from "./parser"

/**
 * Config subcommand actions
 */
export type ConfigAction =
  | { action: "init" }
  | { action: "set"; key: string; value: string }
  | { action: "get"; key: string }
  | { action: "list" }
  | { action: "path" }

type ConfigActionName = ConfigAction["action"]

/**
 * Parsed CLI options for config mode
 */
export interface ConfigCliOptions {
  mode: "config"
  configAction: ConfigAction
}

/** Positional arguments each action takes, as shown in usage */
const PARAMETERS: Record<ConfigActionName, readonly string[]> = {
  init: [],
  set: ["<key>", "<value>"],
  get: ["<key>"],
  list: [],
  path: [],
}

function isActionName(name: string): name is ConfigActionName {
  return Object.keys(PARAMETERS).some((known) => known === name)
}

function usage(name: ConfigActionName): string {
  return ["Usage: pushtalk config", name, ...PARAMETERS[name]].join(" ")
}

/**
 * Parse config subcommand arguments.
 * Expected: config <action> [args...]
 *
 * @param argv Arguments after "config" (e.g., ["set", "tones", "false"])
 */
export function parseConfigArgs(
  argv: string[],
): Result<ConfigCliOptions, CliParseError> {
  const [name, ...args] = argv

  if (name === undefined) {
    return Result.err(
      new CliParseError(
        "Missing config action. Usage: pushtalk config <init|set|get|list|path>",
      ),
    )
  }
  if (!isActionName(name)) {
    return Result.err(
      new CliParseError(
        `Unknown config action: ${name}. Valid actions: ${Object.keys(PARAMETERS).join(", ")}`,
      ),
    )
  }
  if (args.length !== PARAMETERS[name].length) {
    return Result.err(new CliParseError(usage(name)))
  }

  const configAction = toAction(name, args)
  return Result.ok({ mode: "config", configAction })
}

function toAction(name: ConfigActionName, args: string[]): ConfigAction {
  switch (name) {
    case "set":
      return { action: "set", key: args[0], value: args[1] }
    case "get":
      return { action: "get", key: args[0] }
    default:
      return { action: name }
  }
}
