import { mkdir } from "node:fs/promises"
import { hostname } from "node:os"
import type { Logger } from "pino"
import type { LedDriverPort } from "../application/ports/led-driver.port"
import { ButtonInput } from "../application/services/button-input"
import { CuePlayer } from "../application/services/cue-player"
import {
  DEFAULT_LED_ANIMATOR_OPTIONS,
  LedAnimator,
} from "../application/services/led-animator"
import { LedCommandCell } from "../application/services/led-command-cell"
import {
  DEFAULT_FLASH,
  DEFAULT_RETRY,
  SessionOrchestrator,
} from "../application/use-cases/session-orchestrator"
import { GestureDecoder } from "../domain/input/services/gesture-decoder.service"
import { ButtonEvents } from "../domain/input/value-objects/button-event.vo"
import { describeError } from "../domain/shared/result"
import type { RuntimeSettings } from "../infrastructure/config/config.service"
import { GpiomonEdgeAdapter } from "../infrastructure/input/gpiomon-edge.adapter"
import { Apa102SpidevAdapter } from "../infrastructure/led/apa102-spidev.adapter"
import { NullLedAdapter } from "../infrastructure/led/null-led.adapter"
import { HttpRelayAdapter } from "../infrastructure/network/http-relay.adapter"
import { TcpReachabilityAdapter } from "../infrastructure/network/tcp-reachability.adapter"
import { AplayPlaybackAdapter } from "../infrastructure/playback/aplay-playback.adapter"
import { ArecordCaptureAdapter } from "../infrastructure/recording/arecord-capture.adapter"
import { resolveTempDir } from "../infrastructure/storage/temp-dir"
import { DaemonSignalHandler } from "./daemon-signals"
import { EXIT_CODES } from "./parser"
import { PidFile } from "./pid-file"
import { Presenter } from "./presenter"

/**
 * Device runtime.
 * Wires the adapters to the orchestrator, runs until a termination
 * signal and tears everything down in order.
 */
export class DaemonApp {
  private readonly presenter = new Presenter()
  private readonly pidFile = new PidFile()
  private signalHandler: DaemonSignalHandler | null = null

  constructor(
    private readonly settings: RuntimeSettings,
    private readonly logger: Logger,
  ) {}

  /**
   * Run the device until shutdown
   */
  async run(): Promise<number> {
    const pidResult = this.pidFile.acquire()
    if (!pidResult.ok) {
      this.presenter.error(pidResult.error.message)
      return EXIT_CODES.ERROR
    }

    try {
      return await this.runDevice()
    } finally {
      this.signalHandler?.cleanup()
      const released = this.pidFile.release()
      if (!released.ok) {
        this.logger.warn({ err: released.error.message }, "pid-file-failed")
      }
    }
  }

  private async runDevice(): Promise<number> {
    const { settings, logger } = this

    try {
      await mkdir(settings.recordingsDir, { recursive: true })
    } catch (error) {
      logger.error(
        { dir: settings.recordingsDir, err: describeError(error, "mkdir") },
        "recordings-dir-failed",
      )
      return EXIT_CODES.ERROR
    }

    const tempDir = resolveTempDir()
    const playback = new AplayPlaybackAdapter({ device: settings.audioDevice })
    const capture = new ArecordCaptureAdapter({
      device: settings.audioDevice,
      sampleRate: settings.sampleRate,
      channels: settings.channels,
    })
    const relay = new HttpRelayAdapter(
      {
        endpoint: settings.endpoint,
        uploadTimeoutMs: settings.uploadTimeout.toMilliseconds(),
        fetchTimeoutMs: settings.fetchTimeout.toMilliseconds(),
        tempDir,
        deviceName: hostname(),
      },
      logger,
    )
    const reachability = new TcpReachabilityAdapter(
      settings.netHost,
      settings.netPort,
    )
    const ledDriver: LedDriverPort = settings.ledDevice
      ? new Apa102SpidevAdapter(settings.ledDevice, settings.ledBrightness)
      : new NullLedAdapter()

    const leds = new LedCommandCell()
    const animator = new LedAnimator(leds, ledDriver, logger, {
      ...DEFAULT_LED_ANIMATOR_OPTIONS,
      unknownFlashMs: DEFAULT_FLASH.unknownMs,
    })
    const cues = new CuePlayer(playback, logger, {
      enabled: settings.tones,
      sampleRate: settings.sampleRate,
      tempDir,
    })
    const buttons = new ButtonInput(
      new GpiomonEdgeAdapter({
        chip: settings.buttonChip,
        line: settings.buttonLine,
        bias: settings.buttonBias,
        gpiodVersion: settings.gpiodVersion,
      }),
      new GestureDecoder(),
      logger,
    )
    const orchestrator = new SessionOrchestrator(
      { capture, playback, relay, reachability, leds, cues },
      {
        recordingsDir: settings.recordingsDir,
        maxRecording: settings.maxRecording,
        retry: DEFAULT_RETRY,
        flash: DEFAULT_FLASH,
      },
      logger,
    )

    const stopped = new Promise<NodeJS.Signals>((resolve) => {
      this.signalHandler = new DaemonSignalHandler({
        onToggle: () =>
          orchestrator.handleButton(ButtonEvents.doubleTap(performance.now())),
        onTerminate: (signal) => resolve(signal),
        onForceExit: (signal) => {
          const released = this.pidFile.release()
          logger.warn({ signal, pidFileReleased: released.ok }, "forced-exit")
          process.exit(EXIT_CODES.INTERRUPTED)
        },
      })
      this.signalHandler.setup()
    })

    animator.start()
    orchestrator.start()
    const listening = buttons.start((event) => orchestrator.handleButton(event))
    if (!listening.ok) {
      // SIGUSR1 still drives the device without the button
      logger.error({ err: listening.error.message }, "button-source-failed")
    }

    const signal = await stopped
    await orchestrator.shutdown(signal)
    await buttons.stop()
    await animator.stop()
    logger.info({ signal, droppedFrames: animator.droppedFrames }, "stopped")
    return EXIT_CODES.SUCCESS
  }
}
