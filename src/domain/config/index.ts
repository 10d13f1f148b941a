export * from "./errors/config.errors"
export {
  AppConfig,
  type AppConfigData,
  CONFIG_DEFAULTS,
  LINE_BIASES,
  type LineBias,
} from "./value-objects/app-config.vo"
export * from "./value-objects/config-keys.vo"
export { ConfigPath } from "./value-objects/config-path.vo"
