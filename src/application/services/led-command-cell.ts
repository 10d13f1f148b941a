import type { LedCommand } from "../../domain/led/value-objects/led-pattern.vo"

/**
 * Anything that accepts LED commands
 */
export interface LedCommandSink {
  publish(command: LedCommand): void
}

export interface LedCommandSnapshot {
  readonly command: LedCommand
  /** Increases on every publish, even when the command repeats */
  readonly version: number
}

/**
 * Single-slot, overwrite-on-publish cell between the orchestrator and
 * the animator. Readers always see one complete snapshot; older
 * commands are simply lost.
 */
export class LedCommandCell implements LedCommandSink {
  private current: LedCommandSnapshot | null = null

  publish(command: LedCommand): void {
    this.current = Object.freeze({
      command,
      version: (this.current?.version ?? 0) + 1,
    })
  }

  read(): LedCommandSnapshot | null {
    return this.current
  }
}
