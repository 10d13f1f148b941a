import { rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { Logger } from "pino"
import { synthesizeWav } from "../../domain/cue/services/tone-synth.service"
import {
  CUES,
  type CueName,
  type ToneStep,
} from "../../domain/cue/value-objects/tone-step.vo"
import { describeError } from "../../domain/shared/result"
import type { PlaybackHandle, PlaybackPort } from "../ports/playback.port"

/**
 * What the orchestrator needs from the cue player
 */
export interface CueOutput {
  play(cue: CueName): void
  playSteps(label: string, steps: readonly ToneStep[]): void
  /** Resolves once every queued cue has finished */
  drain(): Promise<void>
  /** Cut the running cue short and discard queued ones */
  stop(): Promise<void>
}

export interface CuePlayerOptions {
  enabled: boolean
  sampleRate: number
  tempDir: string
}

/**
 * Plays tone cues one after another through the playback port.
 * When disabled every call is a no-op.
 */
export class CuePlayer implements CueOutput {
  private queue: Promise<void> = Promise.resolve()
  private generation = 0
  private active: PlaybackHandle | null = null
  private counter = 0

  constructor(
    private readonly playback: PlaybackPort,
    private readonly logger: Logger,
    private readonly options: CuePlayerOptions,
  ) {}

  get enabled(): boolean {
    return this.options.enabled
  }

  play(cue: CueName): void {
    this.enqueue(cue, CUES[cue])
  }

  playSteps(label: string, steps: readonly ToneStep[]): void {
    this.enqueue(label, steps)
  }

  drain(): Promise<void> {
    return this.queue
  }

  async stop(): Promise<void> {
    this.generation++
    const active = this.active
    if (active) await this.playback.stop(active)
  }

  private enqueue(label: string, steps: readonly ToneStep[]): void {
    if (!this.options.enabled || steps.length === 0) return
    const generation = this.generation
    this.queue = this.queue.then(() => {
      if (generation !== this.generation) return
      return this.render(label, steps)
    })
  }

  private async render(label: string, steps: readonly ToneStep[]): Promise<void> {
    this.counter++
    const path = join(
      this.options.tempDir,
      `cue_${process.pid}_${this.counter}_${label}.wav`,
    )

    try {
      await writeFile(path, synthesizeWav(steps, this.options.sampleRate))

      const started = this.playback.play(path)
      if (!started.ok) {
        this.logger.warn({ cue: label, err: started.error.message }, "cue-failed")
        return
      }

      this.active = started.value
      const result = await this.playback.wait(started.value)
      if (!result.ok) {
        this.logger.warn({ cue: label, err: result.error.message }, "cue-failed")
      }
    } catch (error) {
      this.logger.warn(
        { cue: label, err: describeError(error, "cue playback failed") },
        "cue-failed",
      )
    } finally {
      this.active = null
      await rm(path, { force: true }).catch((error: unknown) => {
        this.logger.debug(
          { path, err: describeError(error, "remove failed") },
          "cue-cleanup-failed",
        )
      })
    }
  }
}
