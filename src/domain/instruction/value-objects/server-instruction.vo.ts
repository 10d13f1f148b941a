import { z } from "zod"
import {
  type ParsedSoundPattern,
  parseSoundPattern,
} from "../../cue/value-objects/tone-step.vo"
import {
  type LedPattern,
  resolveLedPattern,
} from "../../led/value-objects/led-pattern.vo"

/**
 * Where the response audio comes from
 */
export type AudioSource =
  | { readonly kind: "url"; readonly url: string }
  | { readonly kind: "inline"; readonly base64: string }

/** Accepted keys per logical field, in lookup order */
const AUDIO_URL_KEYS = ["audio_url", "audio"] as const
const LED_KEYS = ["led", "led_pattern", "pattern"] as const
const SOUND_KEYS = ["sound_pattern", "sound"] as const

const objectSchema = z.record(z.unknown())
const nonEmptyString = z.string().trim().min(1)

const DATA_URL = /^data:audio\/[^;]+;base64,(.+)$/s

function firstString(
  body: Record<string, unknown>,
  keys: readonly string[],
): { key: string; value: string } | null {
  for (const key of keys) {
    const parsed = nonEmptyString.safeParse(body[key])
    if (parsed.success) return { key, value: parsed.data }
  }
  return null
}

function isHttpUrl(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://")
}

function resolveAudio(body: Record<string, unknown>): AudioSource | null {
  const found = firstString(body, AUDIO_URL_KEYS)
  if (!found) return null

  if (found.key === "audio_url" || isHttpUrl(found.value)) {
    return { kind: "url", url: found.value }
  }

  const match = DATA_URL.exec(found.value)
  return { kind: "inline", base64: match ? match[1] : found.value }
}

// null, "" and [] count as not sent, so the next key gets its turn
function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  )
}

function resolveSound(body: Record<string, unknown>): ParsedSoundPattern | null {
  for (const key of SOUND_KEYS) {
    if (isBlank(body[key])) continue
    return parseSoundPattern(body[key])
  }
  return null
}

/**
 * Normalized server response.
 * Missing or unrecognized fields default instead of failing.
 */
export class ServerInstruction {
  private constructor(
    readonly audio: AudioSource | null,
    /** Resolved pattern, or null when none was requested */
    readonly ledPattern: LedPattern | null,
    /** The word the server actually sent */
    readonly ledWord: string | null,
    readonly sound: ParsedSoundPattern | null,
  ) {}

  /**
   * Parse a decoded JSON body. Returns null only when the body is not
   * a JSON object.
   */
  static parse(body: unknown): ServerInstruction | null {
    const parsed = objectSchema.safeParse(body)
    if (!parsed.success) return null

    const fields = parsed.data
    const led = firstString(fields, LED_KEYS)

    return new ServerInstruction(
      resolveAudio(fields),
      led ? resolveLedPattern(led.value) : null,
      led?.value ?? null,
      resolveSound(fields),
    )
  }

  get hasAudio(): boolean {
    return this.audio !== null
  }

  /**
   * True when the server named a pattern we do not know
   */
  get isUnknownInstruction(): boolean {
    return this.ledPattern === "unknown"
  }

  /**
   * Loggable summary without the audio payload itself
   */
  summary(): Record<string, unknown> {
    return {
      audio: this.audio?.kind ?? null,
      pattern: this.ledWord,
      resolvedPattern: this.ledPattern,
      soundSteps: this.sound?.steps.length ?? 0,
    }
  }
}
