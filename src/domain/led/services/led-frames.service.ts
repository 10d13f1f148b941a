import type { LedPattern } from "../value-objects/led-pattern.vo"

export interface Rgb {
  readonly r: number
  readonly g: number
  readonly b: number
}

/** One frame for the two-pixel strip */
export type Frame = readonly [Rgb, Rgb]

const OFF: Rgb = { r: 0, g: 0, b: 0 }
export const OFF_FRAME: Frame = [OFF, OFF]

const ORANGE: Rgb = { r: 255, g: 165, b: 0 }
const GREEN: Rgb = { r: 0, g: 255, b: 0 }
const ALERT_RED: Rgb = { r: 255, g: 0, b: 30 }
const CYAN: Rgb = { r: 0, g: 180, b: 255 }

const BREATHE_PERIOD_MS = 1750
const HUE_DEGREES_PER_MS = 7 / 30
const CHATTER_RAD_PER_MS = 0.32 / 35
const CHATTER_JITTER_STEP_MS = 40
const STROBE_HALF_PERIOD_MS = 80

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)))
}

function scale(color: Rgb, factor: number): Rgb {
  return {
    r: clampByte(color.r * factor),
    g: clampByte(color.g * factor),
    b: clampByte(color.b * factor),
  }
}

/**
 * HSV to RGB with hue in degrees and saturation/value in 0..1
 */
export function hsv(hue: number, saturation = 1, value = 1): Rgb {
  const h = (((hue % 360) + 360) % 360) / 60
  const c = value * saturation
  const x = c * (1 - Math.abs((h % 2) - 1))
  const m = value - c

  const [r, g, b] =
    h < 1
      ? [c, x, 0]
      : h < 2
        ? [x, c, 0]
        : h < 3
          ? [0, c, x]
          : h < 4
            ? [0, x, c]
            : h < 5
              ? [x, 0, c]
              : [c, 0, x]

  return {
    r: clampByte((r + m) * 255),
    g: clampByte((g + m) * 255),
    b: clampByte((b + m) * 255),
  }
}

/**
 * Deterministic 0..1 noise for a step index
 */
function jitter(step: number): number {
  let n = (step * 2654435761) >>> 0
  n = (n ^ (n >>> 15)) >>> 0
  n = Math.imul(n, 2246822519) >>> 0
  n = (n ^ (n >>> 13)) >>> 0
  return n / 0xffffffff
}

/**
 * Render a pattern `elapsedMs` after it started.
 * "unknown" renders its cyan flash; holding the previous pattern
 * afterwards is the animator's job.
 */
export function renderPattern(pattern: LedPattern, elapsedMs: number): Frame {
  switch (pattern) {
    case "connecting": {
      const level =
        0.5 + 0.5 * Math.sin((2 * Math.PI * elapsedMs) / BREATHE_PERIOD_MS)
      const color = scale(ORANGE, 0.48 + 0.48 * level)
      return [color, color]
    }
    case "ready":
      return [GREEN, GREEN]
    case "recording": {
      const color = hsv(elapsedMs * HUE_DEGREES_PER_MS)
      return [color, color]
    }
    case "playback": {
      const phase = elapsedMs * CHATTER_RAD_PER_MS
      const a = 0.5 + 0.5 * Math.sin(phase)
      const b = 0.5 + 0.5 * Math.sin(phase + Math.PI)
      const flicker =
        0.7 + 0.3 * jitter(Math.floor(elapsedMs / CHATTER_JITTER_STEP_MS))
      return [
        scale({ r: 40 + 215 * a, g: 40 + 215 * b, b: 255 }, flicker),
        scale({ r: 40 + 215 * b, g: 40 + 215 * a, b: 255 }, flicker),
      ]
    }
    case "error": {
      const on = Math.floor(elapsedMs / STROBE_HALF_PERIOD_MS) % 2 === 0
      return on ? [ALERT_RED, ALERT_RED] : OFF_FRAME
    }
    case "unknown":
      return [CYAN, CYAN]
  }
}
