import { setTimeout as delay } from "node:timers/promises"
import type { Logger } from "pino"
import type { ButtonEvent } from "../../domain/input/value-objects/button-event.vo"
import type { ServerInstruction } from "../../domain/instruction/value-objects/server-instruction.vo"
import type { Duration } from "../../domain/recording/value-objects/duration.vo"
import { SessionMachine } from "../../domain/session/entities/session-machine.entity"
import {
  type RecordingMode,
  RecordingSession,
} from "../../domain/session/entities/recording-session.entity"
import { AlreadyRecordingError } from "../../domain/session/errors/session.errors"
import type { SessionState } from "../../domain/session/value-objects/session-state.vo"
import { Result, describeError } from "../../domain/shared/result"
import {
  type CaptureHandle,
  type CapturePort,
  DeviceUnavailableError,
} from "../ports/capture.port"
import type {
  PlaybackFailedError,
  PlaybackHandle,
  PlaybackPort,
} from "../ports/playback.port"
import type { ReachabilityPort } from "../ports/reachability.port"
import type {
  BadResponseError,
  FetchFailedError,
  RelayPort,
  UploadFailedError,
} from "../ports/relay.port"
import { type ProcessExit, describeExit } from "../ports/subprocess.port"
import type { CueOutput } from "../services/cue-player"
import type { LedCommandSink } from "../services/led-command-cell"
import { LedSignaller } from "../services/led-signaller"

/**
 * Settings for the session orchestrator
 */
export interface OrchestratorConfig {
  recordingsDir: string
  maxRecording: Duration
  /** Delay before the first reachability retry; doubles up to maxMs */
  retry: { initialMs: number; maxMs: number }
  /** How long error and server-requested patterns stay before ready */
  flash: { errorMs: number; unknownMs: number; instructionMs: number }
}

export const DEFAULT_FLASH = {
  errorMs: 800,
  unknownMs: 600,
  instructionMs: 1200,
} as const

export const DEFAULT_RETRY = { initialMs: 1000, maxMs: 8000 } as const

export interface OrchestratorPorts {
  capture: CapturePort
  playback: PlaybackPort
  relay: RelayPort
  reachability: ReachabilityPort
  leds: LedCommandSink
  cues: CueOutput
}

/**
 * Observer hooks, mainly for the CLI and tests
 */
export interface OrchestratorCallbacks {
  onStateChange?: (state: SessionState, previous: SessionState) => void
}

/**
 * Everything the orchestrator reacts to. Jobs report back only through
 * these events.
 */
type SessionEvent =
  | { type: "button"; button: ButtonEvent }
  | { type: "shutdown"; reason: string }
  | { type: "networkReady" }
  | { type: "recordingLimit"; sessionId: string }
  | { type: "captureStarted"; sessionId: string; handle: CaptureHandle }
  | { type: "captureFailed"; sessionId: string; error: DeviceUnavailableError }
  | { type: "captureExited"; sessionId: string; exit: ProcessExit }
  | {
      type: "captureStopped"
      sessionId: string
      result: Result<number, DeviceUnavailableError>
    }
  | { type: "uploadSucceeded"; instruction: ServerInstruction }
  | { type: "uploadFailed"; error: UploadFailedError | BadResponseError }
  | { type: "fetchSucceeded"; path: string }
  | { type: "fetchFailed"; error: FetchFailedError }
  | { type: "playbackStarted"; path: string; handle: PlaybackHandle }
  | {
      type: "playbackFinished"
      path: string
      result: Result<void, PlaybackFailedError | DeviceUnavailableError>
    }
  | { type: "jobFailed"; job: string; error: Error }

type Job = () => Promise<SessionEvent | null>

/**
 * Session orchestrator use case.
 *
 * Owns the session state machine and is the only place that changes
 * it. Events are handled strictly one at a time, in arrival order, and
 * handling never waits on I/O: subprocess and network work runs in
 * jobs that report their outcome back as another event.
 */
export class SessionOrchestrator {
  private readonly machine = new SessionMachine()
  private readonly signaller: LedSignaller
  private readonly lifetime = new AbortController()
  private readonly jobs = new Set<Promise<void>>()
  private readonly queue: SessionEvent[] = []
  private processing = false
  private callbacks: OrchestratorCallbacks = {}

  private recording: RecordingSession<CaptureHandle> | null = null
  private captureStop: Promise<void> = Promise.resolve()
  private limitTimer: NodeJS.Timeout | null = null
  private instruction: ServerInstruction | null = null
  private playbackHandle: PlaybackHandle | null = null
  private recordedBytes = 0
  private shutdownDone: Promise<void> | null = null

  constructor(
    private readonly ports: OrchestratorPorts,
    private readonly config: OrchestratorConfig,
    private readonly logger: Logger,
  ) {
    this.signaller = new LedSignaller(ports.leds)
  }

  /**
   * Set event callbacks
   */
  setCallbacks(callbacks: OrchestratorCallbacks): void {
    this.callbacks = callbacks
  }

  get state(): SessionState {
    return this.machine.state
  }

  /**
   * Whether a recording session currently exists
   */
  get hasRecordingSession(): boolean {
    return this.recording !== null
  }

  /**
   * Whether a response playback is currently live
   */
  get hasLivePlayback(): boolean {
    return this.playbackHandle?.isAlive ?? false
  }

  /**
   * Leave booting and start waiting for the network
   */
  start(): void {
    if (!this.moveTo("connecting")) return
    this.logger.info(
      { target: this.ports.reachability.target, state: "booting" },
      "startup",
    )
    this.ports.cues.play("startup")
    this.signaller.show("connecting")
    this.launch("connect", () => this.waitForNetwork())
  }

  /**
   * Deliver a decoded button event
   */
  handleButton(button: ButtonEvent): void {
    this.dispatch({ type: "button", button })
  }

  /**
   * Enter shuttingDown and resolve once every subprocess, download and
   * cue has finished. Calling it again returns the same promise.
   */
  shutdown(reason = "signal"): Promise<void> {
    if (!this.machine.isShuttingDown) {
      this.dispatch({ type: "shutdown", reason })
    }
    return this.shutdownDone ?? Promise.resolve()
  }

  private dispatch(event: SessionEvent): void {
    this.queue.push(event)
    if (this.processing) return

    this.processing = true
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        this.process(next)
      }
    } finally {
      this.processing = false
    }
  }

  private process(event: SessionEvent): void {
    try {
      this.step(event)
    } catch (error) {
      this.logger.error(
        {
          event: event.type,
          state: this.machine.state,
          err: describeError(error, "event handling failed"),
        },
        "event-failed",
      )
    }
  }

  private step(event: SessionEvent): void {
    if (event.type === "shutdown") {
      this.beginShutdown(event.reason)
      return
    }
    if (this.machine.isShuttingDown) {
      this.collectOrphan(event)
      return
    }
    if (event.type === "captureStarted") {
      this.onCaptureStarted(event.sessionId, event.handle)
      return
    }
    if (event.type === "jobFailed") {
      this.onJobFailed(event.job, event.error)
      return
    }

    if (this.handleInState(event)) return

    if (event.type === "button") {
      this.logger.debug(
        { button: event.button.type, state: this.machine.state },
        "button-ignored",
      )
      return
    }
    this.collectOrphan(event)
  }

  private onJobFailed(job: string, error: Error): void {
    switch (this.machine.state) {
      case "recording":
      case "uploading":
      case "awaitingPlayback":
      case "playing":
        this.fail(error, "job-failed", { job })
        return
      case "connecting":
        this.logger.error({ job, err: error.message }, "job-failed")
        this.launch("connect", () => this.waitForNetwork())
        return
      default:
        this.logger.error(
          { job, state: this.machine.state, err: error.message },
          "job-failed",
        )
    }
  }

  private handleInState(event: SessionEvent): boolean {
    switch (this.machine.state) {
      case "connecting":
        if (event.type !== "networkReady") return false
        this.logger.info(
          { target: this.ports.reachability.target },
          "network-ready",
        )
        this.enterReady()
        return true

      case "ready":
        if (event.type !== "button") return false
        if (event.button.type === "down") return this.beginRecording("hold")
        if (event.button.type === "doubleTap") return this.beginRecording("toggle")
        return false

      case "recording":
        return this.handleRecording(event)

      case "uploading":
        return this.handleUploading(event)

      case "awaitingPlayback":
        if (event.type === "fetchSucceeded") {
          this.moveTo("playing")
          this.launchPlayback(event.path)
          return true
        }
        if (event.type === "fetchFailed") {
          this.logger.error({ err: event.error.message }, "fetch-failed")
          this.recover(event.error)
          return true
        }
        return false

      case "playing":
        if (event.type === "playbackStarted") {
          this.playbackHandle = event.handle
          this.logger.info({ pid: event.handle.pid }, "playback-start")
          this.launch("playback-wait", () => this.awaitPlayback(event))
          return true
        }
        if (event.type === "playbackFinished") {
          this.playbackHandle = null
          this.discardDownload(event.path)
          if (!event.result.ok) {
            this.logger.error({ err: event.result.error.message }, "playback-error")
            this.recover(event.result.error)
            return true
          }
          this.logger.info("playback-done")
          this.enterReady(this.instruction)
          return true
        }
        return false

      default:
        return false
    }
  }

  private handleRecording(event: SessionEvent): boolean {
    const session = this.recording
    if (!session) return false

    switch (event.type) {
      case "button": {
        const ends =
          session.mode === "hold"
            ? event.button.type === "up"
            : event.button.type === "doubleTap"
        if (!ends) return false
        this.stopRecording(session, session.mode === "hold" ? "released" : "toggled")
        return true
      }
      case "recordingLimit":
        if (event.sessionId !== session.id) return false
        this.logger.info(
          { session: session.id, limit: this.config.maxRecording.toString() },
          "recording-limit",
        )
        this.stopRecording(session, "limit")
        return true
      case "captureFailed":
        if (event.sessionId !== session.id) return false
        this.fail(event.error, "capture-failed", { session: session.id })
        return true
      case "captureExited":
        if (event.sessionId !== session.id) return false
        this.fail(
          new DeviceUnavailableError(
            `Recorder exited early: ${describeExit(event.exit)}`,
          ),
          "capture-failed",
          { session: session.id },
        )
        return true
      default:
        return false
    }
  }

  private handleUploading(event: SessionEvent): boolean {
    switch (event.type) {
      case "captureFailed":
        if (event.sessionId !== this.recording?.id) return false
        this.fail(event.error, "capture-failed", { session: event.sessionId })
        return true

      case "captureStopped": {
        const session = this.recording
        if (!session || event.sessionId !== session.id) return false
        session.release()
        this.recording = null
        this.ports.cues.play("release")

        if (!event.result.ok) {
          this.logger.error(
            { session: session.id, err: event.result.error.message },
            "capture-failed",
          )
          this.recover(event.result.error)
          return true
        }

        this.recordedBytes = event.result.value
        this.logger.info(
          { session: session.id, path: session.path, bytes: event.result.value },
          "recording-stop",
        )
        const signal = this.lifetime.signal
        this.launch("upload", () => this.upload(session.path, signal))
        return true
      }

      case "uploadSucceeded": {
        const instruction = event.instruction
        this.instruction = instruction
        this.logger.info({ bytes: this.recordedBytes }, "upload-ok")
        this.logger.info(instruction.summary(), "server-response")
        if (instruction.isUnknownInstruction) {
          this.logger.warn({ pattern: instruction.ledWord }, "unknown-instruction")
        }
        this.queueServerSound(instruction)

        const audio = instruction.audio
        if (!audio) {
          this.enterReady(instruction)
          return true
        }

        this.moveTo("awaitingPlayback")
        this.signaller.show("playback")
        this.ports.cues.play("response")
        const signal = this.lifetime.signal
        this.launch("fetch", async () => {
          const fetched = await this.ports.relay.fetch(audio, signal)
          return fetched.ok
            ? { type: "fetchSucceeded", path: fetched.value }
            : { type: "fetchFailed", error: fetched.error }
        })
        return true
      }

      case "uploadFailed":
        this.logger.error(
          { err: event.error.message, code: event.error.code },
          "upload-failed",
        )
        this.recover(event.error)
        return true

      default:
        return false
    }
  }

  private beginRecording(mode: RecordingMode): boolean {
    if (this.recording) {
      const error = new AlreadyRecordingError(this.recording.id)
      this.logger.error(
        { session: error.existingSessionId, state: this.machine.state },
        "already-recording",
      )
      return true
    }

    const session = RecordingSession.create<CaptureHandle>(
      this.config.recordingsDir,
      mode,
    )
    if (!this.moveTo("recording")) return true

    this.recording = session
    this.instruction = null
    this.signaller.show("recording")
    this.logger.info(
      { session: session.id, path: session.path, mode },
      "recording-start",
    )

    this.ports.cues.play("activate")
    this.limitTimer = setTimeout(
      () => this.dispatch({ type: "recordingLimit", sessionId: session.id }),
      this.config.maxRecording.toMilliseconds(),
    )

    const previousStop = this.captureStop
    const signal = this.lifetime.signal
    this.launch("capture-start", async () => {
      await previousStop
      await this.ports.cues.drain()
      if (signal.aborted) return null
      const started = this.ports.capture.start(session.path)
      return started.ok
        ? { type: "captureStarted", sessionId: session.id, handle: started.value }
        : { type: "captureFailed", sessionId: session.id, error: started.error }
    })
    return true
  }

  private onCaptureStarted(sessionId: string, handle: CaptureHandle): void {
    const session = this.recording
    if (!session || session.id !== sessionId || !session.attach(handle)) {
      this.stopCapture(handle, null)
      return
    }

    this.launch("capture-watch", async () => {
      const exit = await handle.exited
      return { type: "captureExited", sessionId, exit }
    })

    // Released before the recorder came up
    if (this.machine.state === "uploading") {
      this.stopCapture(handle, sessionId)
    }
  }

  private stopRecording(
    session: RecordingSession<CaptureHandle>,
    reason: string,
  ): void {
    this.clearLimit()
    this.moveTo("uploading")
    this.signaller.show("connecting")
    this.logger.debug({ session: session.id, reason }, "recording-ending")

    const handle = session.handle
    if (handle) this.stopCapture(handle, session.id)
  }

  /**
   * Stop a recorder; `sessionId` null means nobody waits for the result
   */
  private stopCapture(handle: CaptureHandle, sessionId: string | null): void {
    const stopping = this.launch("capture-stop", async () => {
      const result = await this.ports.capture.stop(handle)
      if (sessionId === null) return null
      return { type: "captureStopped", sessionId, result }
    })
    this.captureStop = stopping
  }

  private launchPlayback(path: string): void {
    const signal = this.lifetime.signal
    this.launch("playback-start", async () => {
      await this.ports.cues.drain()
      if (signal.aborted) {
        await this.ports.relay.release(path)
        return null
      }
      const started = this.ports.playback.play(path)
      return started.ok
        ? { type: "playbackStarted", path, handle: started.value }
        : { type: "playbackFinished", path, result: started }
    })
  }

  private async awaitPlayback(event: {
    path: string
    handle: PlaybackHandle
  }): Promise<SessionEvent> {
    const result = await this.ports.playback.wait(event.handle)
    return { type: "playbackFinished", path: event.path, result }
  }

  private async upload(path: string, signal: AbortSignal): Promise<SessionEvent> {
    const result = await this.ports.relay.upload(path, signal)
    return result.ok
      ? { type: "uploadSucceeded", instruction: result.value }
      : { type: "uploadFailed", error: result.error }
  }

  private async waitForNetwork(): Promise<SessionEvent | null> {
    const signal = this.lifetime.signal
    let backoff = this.config.retry.initialMs

    while (!signal.aborted) {
      const result = await this.ports.reachability.probe(signal)
      if (result.ok) return { type: "networkReady" }

      this.logger.debug(
        { target: result.error.target, err: result.error.message, retryMs: backoff },
        "network-wait",
      )
      try {
        await delay(backoff, undefined, { signal })
      } catch (error) {
        if (signal.aborted) return null
        throw error
      }
      backoff = Math.min(backoff * 2, this.config.retry.maxMs)
    }
    return null
  }

  private queueServerSound(instruction: ServerInstruction): void {
    const sound = instruction.sound
    if (!sound) return
    if (sound.skipped > 0) {
      this.logger.debug({ skipped: sound.skipped }, "sound-steps-skipped")
    }
    this.ports.cues.playSteps("server", sound.steps)
  }

  private enterReady(instruction: ServerInstruction | null = null): void {
    this.moveTo("ready")

    const requested = instruction?.ledPattern ?? null
    if (requested === null || requested === "ready") {
      this.signaller.show("ready")
    } else {
      const holdMs =
        requested === "unknown"
          ? this.config.flash.unknownMs
          : this.config.flash.instructionMs
      this.signaller.flash(requested, "ready", holdMs)
    }
    this.logger.info("ready")
  }

  /**
   * Abandon whatever the session holds and go through recoveringError
   */
  private fail(
    error: Error,
    tag: string,
    context: Record<string, unknown> = {},
  ): void {
    this.logger.error(
      { ...context, state: this.machine.state, err: error.message },
      tag,
    )

    this.clearLimit()
    const session = this.recording
    this.recording = null
    const captureHandle = session?.release() ?? null
    if (captureHandle) this.stopCapture(captureHandle, null)

    const playbackHandle = this.playbackHandle
    this.playbackHandle = null
    if (playbackHandle) {
      this.launch("playback-stop", async () => {
        await this.ports.playback.stop(playbackHandle)
        await this.ports.relay.release(playbackHandle.path)
        return null
      })
    }

    this.recover(error)
  }

  private recover(error: Error): void {
    if (!this.moveTo("recoveringError")) return
    this.logger.debug({ err: error.name }, "recovering")
    this.signaller.flash("error", "ready", this.config.flash.errorMs)

    this.moveTo("ready")
    this.logger.info("ready")
  }

  private beginShutdown(reason: string): void {
    const previous = this.machine.state
    if (!this.moveTo("shuttingDown")) return

    this.logger.info({ reason, state: previous }, "shutdown")
    this.clearLimit()
    this.signaller.dispose()
    this.lifetime.abort()
    this.shutdownDone = this.cleanup()
  }

  private async cleanup(): Promise<void> {
    const session = this.recording
    this.recording = null
    const captureHandle = session?.release() ?? null
    const playbackHandle = this.playbackHandle
    this.playbackHandle = null

    await Promise.all([
      captureHandle ? this.finishCapture(captureHandle) : undefined,
      playbackHandle ? this.ports.playback.stop(playbackHandle) : undefined,
      this.ports.cues.stop(),
    ])
    await this.settleJobs()

    this.ports.cues.play("outro")
    await this.ports.cues.drain()
  }

  private async finishCapture(handle: CaptureHandle): Promise<void> {
    const result = await this.ports.capture.stop(handle)
    if (result.ok) {
      this.logger.info(
        { path: handle.path, bytes: result.value, reason: "shutdown" },
        "recording-stop",
      )
    } else {
      this.logger.warn({ err: result.error.message }, "capture-failed")
    }
  }

  /**
   * Handles and files that turn up after their session was abandoned
   * still need releasing.
   */
  private collectOrphan(event: SessionEvent): void {
    switch (event.type) {
      case "captureStarted":
        this.stopCapture(event.handle, null)
        return
      case "playbackStarted": {
        const handle = event.handle
        this.launch("playback-stop", async () => {
          await this.ports.playback.stop(handle)
          await this.ports.relay.release(event.path)
          return null
        })
        return
      }
      case "fetchSucceeded":
      case "playbackFinished": {
        const path = event.path
        this.launch("discard", async () => {
          await this.ports.relay.release(path)
          return null
        })
        return
      }
      default:
        this.logger.debug(
          { event: event.type, state: this.machine.state },
          "event-ignored",
        )
    }
  }

  private discardDownload(path: string): void {
    this.launch("discard", async () => {
      await this.ports.relay.release(path)
      return null
    })
  }

  private async settleJobs(): Promise<void> {
    while (this.jobs.size > 0) {
      await Promise.allSettled([...this.jobs])
    }
  }

  /**
   * Run a job outside the event loop and feed its outcome back in
   */
  private launch(name: string, job: Job): Promise<void> {
    const tracked: Promise<void> = job()
      .then(
        (event) => {
          if (event) this.dispatch(event)
        },
        (error: unknown) => {
          this.dispatch({
            type: "jobFailed",
            job: name,
            error:
              error instanceof Error
                ? error
                : new Error(describeError(error, `${name} failed`)),
          })
        },
      )
      .finally(() => {
        this.jobs.delete(tracked)
      })
    this.jobs.add(tracked)
    return tracked
  }

  private moveTo(target: SessionState): boolean {
    const result = this.machine.moveTo(target)
    if (!result.ok) {
      this.logger.error({ err: result.error.message }, "invalid-transition")
      return false
    }
    this.logger.debug({ from: result.value, to: target }, "state-change")
    this.callbacks.onStateChange?.(target, result.value)
    return true
  }

  private clearLimit(): void {
    if (this.limitTimer) {
      clearTimeout(this.limitTimer)
      this.limitTimer = null
    }
  }
}
