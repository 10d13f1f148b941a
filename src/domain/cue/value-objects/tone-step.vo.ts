import { z } from "zod"

/**
 * One stereo tone: left/right frequency in Hz, duration in seconds,
 * volume in 0..1.
 */
export interface ToneStep {
  readonly fL: number
  readonly fR: number
  readonly duration: number
  readonly volume: number
}

export type CueName = "startup" | "outro" | "activate" | "release" | "response"

const step = (fL: number, fR: number, duration: number, volume: number) =>
  Object.freeze({ fL, fR, duration, volume })

/**
 * Built-in cue sequences
 */
export const CUES: Record<CueName, readonly ToneStep[]> = {
  startup: [
    step(740, 550, 0.12, 0.35),
    step(880, 660, 0.14, 0.38),
    step(988, 740, 0.18, 0.4),
    step(1175, 880, 0.22, 0.42),
  ],
  outro: [
    step(988, 740, 0.14, 0.35),
    step(880, 660, 0.12, 0.33),
    step(740, 550, 0.1, 0.3),
  ],
  activate: [step(1400, 1600, 0.09, 0.38), step(1900, 2100, 0.08, 0.4)],
  release: [step(1100, 900, 0.07, 0.33), step(800, 700, 0.06, 0.3)],
  response: [
    step(1600, 1700, 0.06, 0.35),
    step(2000, 1500, 0.08, 0.35),
    step(1700, 1700, 0.05, 0.3),
  ],
}

const MAX_STEPS = 32
const MAX_STEP_SECONDS = 2
const MAX_FREQUENCY = 20_000

const number = z.coerce.number().finite().optional()

/**
 * Server-side step description. Short and long field names are both
 * accepted; a mono `f` applies to both channels.
 */
const soundStepSchema = z.object({
  fL: number,
  f: number,
  fR: number,
  d: number,
  dur: number,
  v: number,
  vol: number,
})

const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value))

export interface ParsedSoundPattern {
  steps: ToneStep[]
  skipped: number
}

/**
 * Parse a structured sound payload into tone steps.
 * Returns null when the payload is not a list at all; malformed
 * entries inside a list are counted and skipped.
 */
export function parseSoundPattern(payload: unknown): ParsedSoundPattern | null {
  if (!Array.isArray(payload)) return null

  const steps: ToneStep[] = []
  let skipped = 0

  for (const entry of payload.slice(0, MAX_STEPS)) {
    const parsed = soundStepSchema.safeParse(entry)
    if (!parsed.success) {
      skipped++
      continue
    }
    const raw = parsed.data
    const fL = raw.fL ?? raw.f ?? 1000
    steps.push(
      step(
        clamp(fL, 0, MAX_FREQUENCY),
        clamp(raw.fR ?? fL, 0, MAX_FREQUENCY),
        clamp(raw.d ?? raw.dur ?? 0.08, 0, MAX_STEP_SECONDS),
        clamp(raw.v ?? raw.vol ?? 0.35, 0, 1),
      ),
    )
  }

  skipped += Math.max(0, payload.length - MAX_STEPS)
  return { steps, skipped }
}
