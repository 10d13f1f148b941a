import { ConfigService } from "../infrastructure/config/config.service"
import { XdgConfigAdapter } from "../infrastructure/config/xdg-config.adapter"
import { createLogger } from "../infrastructure/logging/logger"
import { TcpReachabilityAdapter } from "../infrastructure/network/tcp-reachability.adapter"
import { CheckCommand } from "./check-command"
import { ConfigCommand } from "./config-command"
import { DaemonApp } from "./daemon-app"
import { EXIT_CODES, getHelpText, parseCliArgs, VERSION } from "./parser"
import { Presenter } from "./presenter"

/**
 * Main CLI application.
 * Wires dependencies and dispatches to the selected command.
 */
export class App {
  private readonly presenter = new Presenter()

  /**
   * Run the CLI application
   */
  async run(argv: string[]): Promise<number> {
    const parseResult = parseCliArgs(argv)

    if (!parseResult.ok) {
      this.presenter.error(parseResult.error.message)
      this.presenter.info("Run 'pushtalk --help' for usage information.")
      return EXIT_CODES.USAGE_ERROR
    }

    const options = parseResult.value

    switch (options.mode) {
      case "help":
        this.presenter.output(getHelpText())
        return EXIT_CODES.SUCCESS

      case "version":
        this.presenter.output(`pushtalk v${VERSION}`)
        return EXIT_CODES.SUCCESS

      // Config subcommands work without an endpoint
      case "config":
        return new ConfigCommand(new XdgConfigAdapter()).execute(
          options.configAction,
        )

      case "check":
      case "run":
        break
    }

    const configService = new ConfigService(
      new XdgConfigAdapter(),
      options.overrides,
    )
    const settingsResult = await configService.loadSettings()
    if (!settingsResult.ok) {
      this.presenter.error(settingsResult.error.message)
      return EXIT_CODES.ERROR
    }
    const settings = settingsResult.value

    if (options.mode === "check") {
      const reachability = new TcpReachabilityAdapter(
        settings.netHost,
        settings.netPort,
      )
      return new CheckCommand(reachability, this.presenter).execute()
    }

    const logger = createLogger({
      verbose: settings.verbose,
      file: settings.logFile,
    })
    return new DaemonApp(settings, logger).run()
  }
}
