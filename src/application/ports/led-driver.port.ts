import type { Frame } from "../../domain/led/services/led-frames.service"
import type { Result } from "../../domain/shared/result"

export class LedWriteError extends Error {
  readonly code = "LED_WRITE_ERROR"

  constructor(message: string) {
    super(message)
    this.name = "LedWriteError"
  }
}

/**
 * Port interface for the two-pixel LED output
 */
export interface LedDriverPort {
  write(frame: Frame): Promise<Result<void, LedWriteError>>
  close(): Promise<void>
}
