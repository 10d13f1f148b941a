import type {
  LedDriverPort,
  LedWriteError,
} from "../../application/ports/led-driver.port"
import { Result } from "../../domain/shared/result"

/**
 * Driver for boards without an LED strip (`led_device = "none"`)
 */
export class NullLedAdapter implements LedDriverPort {
  async write(): Promise<Result<void, LedWriteError>> {
    return Result.ok(undefined)
  }

  async close(): Promise<void> {}
}
