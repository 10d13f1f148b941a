import type { ToneStep } from "../value-objects/tone-step.vo"

const CHANNELS = 2
const BYTES_PER_SAMPLE = 2
const FRAME_BYTES = CHANNELS * BYTES_PER_SAMPLE
const HEADER_BYTES = 44
const FADE_MS = 8
const SPACER_SECONDS = 0.01

/**
 * Render a sine tone into interleaved 16-bit stereo frames
 */
function toneFrames(
  fL: number,
  fR: number,
  duration: number,
  volume: number,
  sampleRate: number,
): Int16Array {
  const frames = Math.floor(duration * sampleRate)
  const out = new Int16Array(frames * CHANNELS)
  const amplitude = volume * 32767

  for (let i = 0; i < frames; i++) {
    const t = i / sampleRate
    out[i * 2] = Math.trunc(amplitude * Math.sin(2 * Math.PI * fL * t))
    out[i * 2 + 1] = Math.trunc(amplitude * Math.sin(2 * Math.PI * fR * t))
  }
  return out
}

/**
 * Linear attack/release so tones don't click. Short tones are left alone.
 */
function applyFade(samples: Int16Array, sampleRate: number): void {
  const fadeFrames = Math.floor((sampleRate * FADE_MS) / 1000)
  const frames = samples.length / CHANNELS
  if (frames <= 2 * fadeFrames) return

  for (let i = 0; i < fadeFrames; i++) {
    const gain = i / fadeFrames
    const tail = frames - 1 - i
    for (let ch = 0; ch < CHANNELS; ch++) {
      samples[i * CHANNELS + ch] = Math.trunc(samples[i * CHANNELS + ch] * gain)
      samples[tail * CHANNELS + ch] = Math.trunc(
        samples[tail * CHANNELS + ch] * gain,
      )
    }
  }
}

function wavHeader(dataBytes: number, sampleRate: number): Buffer {
  const header = Buffer.alloc(HEADER_BYTES)
  header.write("RIFF", 0, "ascii")
  header.writeUInt32LE(36 + dataBytes, 4)
  header.write("WAVE", 8, "ascii")
  header.write("fmt ", 12, "ascii")
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20)
  header.writeUInt16LE(CHANNELS, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * FRAME_BYTES, 28)
  header.writeUInt16LE(FRAME_BYTES, 32)
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34)
  header.write("data", 36, "ascii")
  header.writeUInt32LE(dataBytes, 40)
  return header
}

/**
 * Synthesize a tone sequence as a complete 16-bit stereo PCM WAV file.
 * Each step is followed by a short silent spacer.
 */
export function synthesizeWav(
  steps: readonly ToneStep[],
  sampleRate: number,
): Buffer {
  const chunks: Buffer[] = []

  for (const step of steps) {
    const tone = toneFrames(
      step.fL,
      step.fR,
      step.duration,
      step.volume,
      sampleRate,
    )
    applyFade(tone, sampleRate)
    chunks.push(Buffer.from(tone.buffer, tone.byteOffset, tone.byteLength))

    const spacer = new Int16Array(
      Math.floor(SPACER_SECONDS * sampleRate) * CHANNELS,
    )
    chunks.push(Buffer.from(spacer.buffer))
  }

  const data = Buffer.concat(chunks)
  return Buffer.concat([wavHeader(data.length, sampleRate), data])
}
