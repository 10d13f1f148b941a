import type { Logger } from "pino"
import type { GestureDecoder } from "../../domain/input/services/gesture-decoder.service"
import type { ButtonEvent } from "../../domain/input/value-objects/button-event.vo"
import { Result } from "../../domain/shared/result"
import type { EdgeSourceError, EdgeSourcePort } from "../ports/edge-source.port"

export interface ButtonInputOptions {
  /** How often pending gestures are checked against the clock */
  tickMs: number
  clock?: () => number
}

/**
 * Feeds raw edges into the gesture decoder and forwards the resulting
 * button events. A timer advances the decoder so deferred taps and
 * holds are reported without waiting for the next edge.
 */
export class ButtonInput {
  private timer: NodeJS.Timeout | null = null
  private readonly clock: () => number

  constructor(
    private readonly source: EdgeSourcePort,
    private readonly decoder: GestureDecoder,
    private readonly logger: Logger,
    private readonly options: ButtonInputOptions = { tickMs: 10 },
  ) {
    this.clock = options.clock ?? (() => performance.now())
  }

  start(onButton: (event: ButtonEvent) => void): Result<void, EdgeSourceError> {
    const emit = (events: ButtonEvent[]) => {
      for (const event of events) {
        this.logger.debug({ button: event.type, at: event.at }, "button")
        onButton(event)
      }
    }

    const started = this.source.start({
      onEdge: (edge) => emit(this.decoder.push(edge)),
      onError: (error) =>
        this.logger.error({ err: error.message }, "button-source-failed"),
    })
    if (!started.ok) return started

    this.timer = setInterval(
      () => emit(this.decoder.tick(this.clock())),
      this.options.tickMs,
    )
    return Result.ok(undefined)
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.source.stop()
  }
}
