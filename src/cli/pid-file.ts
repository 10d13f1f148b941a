import { readFileSync, rmSync, writeFileSync } from "node:fs"
import { PidFileError } from "../domain/session/errors/session.errors"
import { describeError, Result } from "../domain/shared/result"

const PID_FILE_PATH = "/tmp/pushtalk.pid"

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined
}

/**
 * PID file for the device runtime.
 * Only one instance may own the button, the sound card and the LED bus.
 */
export class PidFile {
  constructor(
    private readonly path: string = PID_FILE_PATH,
    private readonly pid: number = process.pid,
  ) {}

  getPath(): string {
    return this.path
  }

  /**
   * Claim the PID file. A file left behind by a dead process, or one
   * that does not hold a PID, is replaced.
   */
  acquire(): Result<void, PidFileError> {
    const existingPid = this.readPid()
    if (
      existingPid !== null &&
      existingPid !== this.pid &&
      PidFile.isProcessRunning(existingPid)
    ) {
      return Result.err(
        new PidFileError(
          `Another instance is running (PID: ${existingPid})`,
          this.path,
          existingPid,
        ),
      )
    }

    try {
      writeFileSync(this.path, `${this.pid}\n`, "utf-8")
      return Result.ok(undefined)
    } catch (error) {
      return Result.err(
        new PidFileError(
          describeError(error, "Failed to write PID file"),
          this.path,
        ),
      )
    }
  }

  /**
   * Remove the PID file if it still names this process
   */
  release(): Result<void, PidFileError> {
    if (this.readPid() !== this.pid) return Result.ok(undefined)
    try {
      rmSync(this.path, { force: true })
      return Result.ok(undefined)
    } catch (error) {
      return Result.err(
        new PidFileError(
          describeError(error, "Failed to remove PID file"),
          this.path,
        ),
      )
    }
  }

  private readPid(): number | null {
    let text: string
    try {
      text = readFileSync(this.path, "utf-8")
    } catch {
      // Missing and unreadable files count as stale
      return null
    }
    const pid = Number.parseInt(text.trim(), 10)
    return Number.isNaN(pid) ? null : pid
  }

  /**
   * Check if a process with the given PID is running
   */
  static isProcessRunning(pid: number): boolean {
    try {
      // Signal 0 only checks that the process exists
      process.kill(pid, 0)
      return true
    } catch (error) {
      // EPERM: it exists but belongs to someone else
      return errorCode(error) === "EPERM"
    }
  }
}
