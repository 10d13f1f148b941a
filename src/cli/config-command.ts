import type { ConfigPort } from "../application/ports/config.port"
import {
  AppConfig,
  type AppConfigData,
  CONFIG_FIELDS,
  CONFIG_KEYS,
} from "../domain/config"
import type { ConfigAction } from "./config-parser"
import { EXIT_CODES } from "./parser"
import { Presenter } from "./presenter"

/**
 * Handler for config subcommands (init, set, get, list, path)
 */
export class ConfigCommand {
  constructor(
    private readonly configAdapter: ConfigPort,
    private readonly presenter: Presenter = new Presenter(),
  ) {}

  /**
   * Execute a config action and return exit code
   */
  async execute(action: ConfigAction): Promise<number> {
    switch (action.action) {
      case "init":
        return this.init()
      case "set":
        return this.set(action.key, action.value)
      case "get":
        return this.get(action.key)
      case "list":
        return this.list()
      case "path":
        return this.path()
    }
  }

  private async init(): Promise<number> {
    if (await this.configAdapter.exists()) {
      this.presenter.warn(
        `Config file already exists: ${this.configAdapter.getPath()}`,
      )
      return EXIT_CODES.ERROR
    }

    const result = await this.configAdapter.createDefault()
    if (!result.ok) {
      this.presenter.error(result.error.message)
      return EXIT_CODES.ERROR
    }

    this.presenter.success(
      `Created config file: ${this.configAdapter.getPath()}`,
    )
    this.presenter.info(
      "Set the endpoint with: pushtalk config set endpoint <url>",
    )
    return EXIT_CODES.SUCCESS
  }

  private async set(key: string, value: string): Promise<number> {
    const result = await this.configAdapter.setValue(key, value)
    if (!result.ok) {
      this.presenter.error(result.error.message)
      return EXIT_CODES.ERROR
    }

    this.presenter.success(`Set ${key} = ${value}`)
    return EXIT_CODES.SUCCESS
  }

  private async get(key: string): Promise<number> {
    const result = await this.configAdapter.getValue(key)
    if (!result.ok) {
      this.presenter.error(result.error.message)
      return EXIT_CODES.ERROR
    }

    const value = result.value
    if (value === undefined) {
      this.presenter.info(`${key}: (not set)`)
    } else {
      this.presenter.output(String(value))
    }
    return EXIT_CODES.SUCCESS
  }

  private async list(): Promise<number> {
    const result = await this.configAdapter.load()

    let fromFile: AppConfigData
    if (result.ok) {
      fromFile = result.value.toObject()
    } else if (result.error.code === "CONFIG_FILE_NOT_FOUND") {
      this.presenter.info("No config file found. Showing defaults:")
      fromFile = {}
    } else {
      this.presenter.error(result.error.message)
      return EXIT_CODES.ERROR
    }

    const defaults = AppConfig.defaults().toObject()
    for (const key of CONFIG_KEYS) {
      const field = CONFIG_FIELDS[key]
      const own = fromFile[field]
      const fallback = defaults[field]
      if (own !== undefined) {
        this.presenter.setting(key, String(own), "file")
      } else if (fallback !== undefined) {
        this.presenter.setting(key, String(fallback), "default")
      } else {
        this.presenter.setting(key, "", "unset")
      }
    }

    return EXIT_CODES.SUCCESS
  }

  private path(): number {
    this.presenter.output(this.configAdapter.getPath())
    return EXIT_CODES.SUCCESS
  }
}
