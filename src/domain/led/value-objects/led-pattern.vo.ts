/**
 * The six named LED patterns. A pattern name doubles as the LED command:
 * the orchestrator only ever publishes one of these, never frame data.
 */
export type LedPattern =
  | "connecting"
  | "ready"
  | "recording"
  | "playback"
  | "error"
  | "unknown"

export type LedCommand = LedPattern

const LED_PATTERNS: readonly LedPattern[] = [
  "connecting",
  "ready",
  "recording",
  "playback",
  "error",
  "unknown",
]

/**
 * Words a server may use for each pattern
 */
const ALIASES: Record<Exclude<LedPattern, "unknown">, readonly string[]> = {
  connecting: ["connecting", "pulse", "breathe", "orange", "wait", "waiting"],
  ready: ["ready", "green", "ok", "white", "neutral"],
  recording: ["recording", "rainbow", "record_rainbow"],
  playback: ["playback", "talking", "speaking", "blue"],
  error: ["error", "red", "warn"],
}

/**
 * Words that explicitly ask for no pattern change
 */
const NO_PATTERN = ["off", "none"]

/**
 * Resolve a server-supplied pattern word.
 * Returns null for "no pattern", and "unknown" for anything unrecognized.
 */
export function resolveLedPattern(word: string): LedPattern | null {
  const normalized = word.trim().toLowerCase()
  if (normalized === "" || NO_PATTERN.includes(normalized)) return null

  for (const [pattern, words] of Object.entries(ALIASES)) {
    if (words.includes(normalized) && isLedPattern(pattern)) return pattern
  }
  return "unknown"
}

function isLedPattern(value: string): value is LedPattern {
  return LED_PATTERNS.some((known) => known === value)
}
