/**
 * XDG-compliant path resolution for config, data and state files.
 * Follows the XDG Base Directory Specification.
 */

const APP_NAME = "pushtalk"
const CONFIG_FILE = "config.toml"

function home(): string {
  return process.env.HOME ?? ""
}

/**
 * Uses $XDG_CONFIG_HOME if set, otherwise ~/.config
 */
function getConfigDir(): string {
  const base = process.env.XDG_CONFIG_HOME ?? `${home()}/.config`
  return `${base}/${APP_NAME}`
}

function getConfigFilePath(): string {
  return `${getConfigDir()}/${CONFIG_FILE}`
}

/**
 * Uses $XDG_DATA_HOME if set, otherwise ~/.local/share
 */
function getDataDir(): string {
  const base = process.env.XDG_DATA_HOME ?? `${home()}/.local/share`
  return `${base}/${APP_NAME}`
}

/**
 * Uses $XDG_STATE_HOME if set, otherwise ~/.local/state
 */
function getStateDir(): string {
  const base = process.env.XDG_STATE_HOME ?? `${home()}/.local/state`
  return `${base}/${APP_NAME}`
}

export const ConfigPath = {
  getConfigDir,
  getConfigFilePath,
  getDataDir,
  getStateDir,
  defaultRecordingsDir: () => `${getDataDir()}/recordings`,
  defaultLogFile: () => `${getStateDir()}/${APP_NAME}.log`,
}
