import {
  type ButtonEvent,
  ButtonEvents,
  type LineLevel,
  type RawEdge,
} from "../value-objects/button-event.vo"

/**
 * Timing windows used to turn raw edges into button events, in milliseconds.
 */
export interface GestureTimings {
  /** A level must hold this long before it counts */
  debounceMs: number
  /** Max gap between the first release and the second press of a double tap */
  doubleTapMs: number
  /** Presses held at least this long are holds and never part of a double tap */
  tapMaxMs: number
}

export const DEFAULT_GESTURE_TIMINGS: GestureTimings = {
  debounceMs: 25,
  doubleTapMs: 400,
  tapMaxMs: 300,
}

interface Tap {
  pressAt: number
  releaseAt: number
}

type GesturePhase =
  | { kind: "idle" }
  | { kind: "pressed"; pressAt: number }
  | { kind: "holding"; pressAt: number }
  | { kind: "tapped"; tap: Tap }
  | { kind: "secondPress"; first: Tap; pressAt: number }

/**
 * Pure gesture decoder.
 *
 * Feed it timestamped edges with `push()` and let time pass with `tick()`;
 * both return the button events that became certain at that instant.
 *
 * A press that lasts past `tapMaxMs` is a hold and emits `down` right away.
 * A shorter press is a tap and stays pending: a second tap starting within
 * `doubleTapMs` of the first release turns the pair into one `doubleTap`,
 * otherwise the tap is released as an ordinary `down`/`up` pair.
 */
export class GestureDecoder {
  private stable: LineLevel = "inactive"
  private raw: LineLevel = "inactive"
  private rawSince = Number.NEGATIVE_INFINITY
  private lastAt = Number.NEGATIVE_INFINITY
  private phase: GesturePhase = { kind: "idle" }

  constructor(
    private readonly timings: GestureTimings = DEFAULT_GESTURE_TIMINGS,
  ) {}

  /**
   * Feed one raw edge
   */
  push(edge: RawEdge): ButtonEvent[] {
    const events: ButtonEvent[] = []
    let at = edge.at

    // Edges must arrive in time order; anything else breaks the gesture
    if (at < this.lastAt) {
      events.push(...this.abandonGesture())
      at = this.lastAt
    }

    events.push(...this.advance(at))

    if (edge.level !== this.raw) {
      this.raw = edge.level
      this.rawSince = at
    }

    return events
  }

  /**
   * Let time pass without a new edge
   */
  tick(now: number): ButtonEvent[] {
    if (now < this.lastAt) return []
    return this.advance(now)
  }

  private advance(now: number): ButtonEvent[] {
    const events: ButtonEvent[] = []
    this.lastAt = now

    if (
      this.raw !== this.stable &&
      now - this.rawSince >= this.timings.debounceMs
    ) {
      const edgeAt = this.rawSince
      events.push(...this.fireTimers(edgeAt))
      this.stable = this.raw
      events.push(
        ...(this.stable === "active"
          ? this.onPress(edgeAt)
          : this.onRelease(edgeAt)),
      )
    }

    events.push(...this.fireTimers(now))
    return events
  }

  private onPress(at: number): ButtonEvent[] {
    switch (this.phase.kind) {
      case "idle":
        this.phase = { kind: "pressed", pressAt: at }
        return []
      case "tapped":
        this.phase = { kind: "secondPress", first: this.phase.tap, pressAt: at }
        return []
      default:
        return []
    }
  }

  private onRelease(at: number): ButtonEvent[] {
    switch (this.phase.kind) {
      case "pressed":
        this.phase = {
          kind: "tapped",
          tap: { pressAt: this.phase.pressAt, releaseAt: at },
        }
        return []
      case "holding":
        this.phase = { kind: "idle" }
        return [ButtonEvents.up(at)]
      case "secondPress":
        this.phase = { kind: "idle" }
        return [ButtonEvents.doubleTap(at)]
      default:
        return []
    }
  }

  private fireTimers(now: number): ButtonEvent[] {
    const { doubleTapMs, tapMaxMs } = this.timings

    switch (this.phase.kind) {
      case "pressed":
        if (now - this.phase.pressAt < tapMaxMs) return []
        this.phase = { kind: "holding", pressAt: this.phase.pressAt }
        return [ButtonEvents.down(this.phase.pressAt)]
      case "tapped":
        if (now - this.phase.tap.releaseAt < doubleTapMs) return []
        return this.abandonGesture()
      case "secondPress":
        if (now - this.phase.pressAt < tapMaxMs) return []
        return this.abandonGesture()
      default:
        return []
    }
  }

  /**
   * Give up on a pending gesture and release what it held back as
   * independent hold events.
   */
  private abandonGesture(): ButtonEvent[] {
    const phase = this.phase

    switch (phase.kind) {
      case "pressed":
        this.phase = { kind: "holding", pressAt: phase.pressAt }
        return [ButtonEvents.down(phase.pressAt)]
      case "tapped":
        this.phase = { kind: "idle" }
        return [
          ButtonEvents.down(phase.tap.pressAt),
          ButtonEvents.up(phase.tap.releaseAt),
        ]
      case "secondPress":
        this.phase = { kind: "holding", pressAt: phase.pressAt }
        return [
          ButtonEvents.down(phase.first.pressAt),
          ButtonEvents.up(phase.first.releaseAt),
          ButtonEvents.down(phase.pressAt),
        ]
      default:
        return []
    }
  }
}
