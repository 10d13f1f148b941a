import type { ReachabilityPort } from "../application/ports/reachability.port"
import { EXIT_CODES } from "./parser"
import { Presenter } from "./presenter"

/**
 * `pushtalk check`: one reachability probe, no retries
 */
export class CheckCommand {
  constructor(
    private readonly reachability: ReachabilityPort,
    private readonly presenter: Presenter = new Presenter(),
  ) {}

  async execute(): Promise<number> {
    const target = this.reachability.target
    this.presenter.startSpinner(`Connecting to ${target}...`)

    const result = await this.reachability.probe()
    if (!result.ok) {
      this.presenter.spinnerFail(
        `${target} unreachable: ${result.error.message}`,
      )
      return EXIT_CODES.ERROR
    }

    this.presenter.spinnerSuccess(`${target} is reachable`)
    return EXIT_CODES.SUCCESS
  }
}
