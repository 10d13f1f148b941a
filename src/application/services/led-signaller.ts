import type { LedPattern } from "../../domain/led/value-objects/led-pattern.vo"
import type { LedCommandSink } from "./led-command-cell"

/**
 * Publishes LED commands on behalf of the orchestrator.
 *
 * `show()` replaces whatever is displayed. `flash()` shows a pattern
 * for a while and then settles on another one, unless something else
 * is shown first. Repeating the pattern already on display publishes
 * nothing.
 */
export class LedSignaller {
  private last: LedPattern | null = null
  private settleTimer: NodeJS.Timeout | null = null

  constructor(private readonly sink: LedCommandSink) {}

  /**
   * Pattern most recently published
   */
  get current(): LedPattern | null {
    return this.last
  }

  show(pattern: LedPattern): void {
    this.cancelSettle()
    this.publish(pattern)
  }

  flash(pattern: LedPattern, settle: LedPattern, holdMs: number): void {
    this.show(pattern)
    if (pattern === settle) return

    this.settleTimer = setTimeout(() => {
      this.settleTimer = null
      this.publish(settle)
    }, holdMs)
  }

  /**
   * Drop any pending settle
   */
  dispose(): void {
    this.cancelSettle()
  }

  private publish(pattern: LedPattern): void {
    if (pattern === this.last) return
    this.last = pattern
    this.sink.publish(pattern)
  }

  private cancelSettle(): void {
    if (this.settleTimer) {
      clearTimeout(this.settleTimer)
      this.settleTimer = null
    }
  }
}
