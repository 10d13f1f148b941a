/**
 * Level of the physical input line after active-low/active-high translation.
 */
export type LineLevel = "active" | "inactive"

/**
 * A raw transition observed on the input line. `at` is a monotonic
 * timestamp in milliseconds.
 */
export interface RawEdge {
  readonly level: LineLevel
  readonly at: number
}

/**
 * Semantic button event produced by the gesture decoder.
 */
export type ButtonEvent = Readonly<
  | { type: "down"; at: number }
  | { type: "up"; at: number }
  | { type: "doubleTap"; at: number }
>

export const ButtonEvents = {
  down: (at: number): ButtonEvent => Object.freeze({ type: "down", at }),
  up: (at: number): ButtonEvent => Object.freeze({ type: "up", at }),
  doubleTap: (at: number): ButtonEvent =>
    Object.freeze({ type: "doubleTap", at }),
}
