import { DomainError, Result } from "../../shared/result"

export class DurationParseError extends DomainError {
  readonly code = "DURATION_PARSE_ERROR"

  constructor(input: string) {
    super(
      `Invalid duration: "${input}". ` +
        `Use <n>m, <n>s, <n>ms or a combination such as 2m30s or 1s500ms`,
    )
  }
}

/**
 * Value object for a positive time span (timeouts, recording limit).
 */
export class Duration {
  private constructor(private readonly milliseconds: number) {}

  /**
   * Parse "30s", "5m", "2m30s", "750ms" or "1s500ms"
   */
  static parse(input: string): Result<Duration, DurationParseError> {
    const trimmed = input.trim().toLowerCase()
    const match = trimmed.match(/^(?:(\d+)m(?!s))?(?:(\d+)s)?(?:(\d+)ms)?$/)

    if (!match || (!match[1] && !match[2] && !match[3])) {
      return Result.err(new DurationParseError(input))
    }

    const minutes = match[1] ? Number.parseInt(match[1], 10) : 0
    const seconds = match[2] ? Number.parseInt(match[2], 10) : 0
    const millis = match[3] ? Number.parseInt(match[3], 10) : 0
    const total = (minutes * 60 + seconds) * 1000 + millis

    if (total <= 0) {
      return Result.err(new DurationParseError(input))
    }

    return Result.ok(new Duration(total))
  }

  static fromMilliseconds(milliseconds: number): Duration {
    return new Duration(milliseconds)
  }

  toMilliseconds(): number {
    return this.milliseconds
  }

  /**
   * Shortest string that parses back to the same duration
   */
  toString(): string {
    const totalSeconds = Math.floor(this.milliseconds / 1000)
    const millis = this.milliseconds % 1000
    const minutes = Math.floor(totalSeconds / 60)
    const seconds = totalSeconds % 60

    let out = ""
    if (minutes > 0) out += `${minutes}m`
    if (seconds > 0) out += `${seconds}s`
    if (millis > 0) out += `${millis}ms`
    return out
  }
}
