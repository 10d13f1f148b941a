import type {
  ProcessExit,
  SubprocessHandle,
} from "../../application/ports/subprocess.port"
import { type ChildLike, withTimeout } from "./spawner"

const STDERR_TAIL_CHARS = 2000

/**
 * Owned external process with bounded termination.
 * `exited` resolves exactly once and never rejects.
 */
export class ManagedProcess implements SubprocessHandle {
  readonly exited: Promise<ProcessExit>
  private alive = true
  private stderrTail = ""

  constructor(
    readonly path: string,
    private readonly child: ChildLike,
  ) {
    child.stderr?.setEncoding("utf8")
    child.stderr?.on("data", (chunk: string) => {
      this.stderrTail = (this.stderrTail + chunk).slice(-STDERR_TAIL_CHARS)
    })

    this.exited = new Promise((resolve) => {
      child.once("close", (code, signal) => {
        this.alive = false
        resolve({ code, signal, stderr: this.stderrTail })
      })
      child.once("error", (error) => {
        this.alive = false
        resolve({ code: null, signal: null, stderr: this.stderrTail, error })
      })
    })
  }

  get pid(): number | undefined {
    return this.child.pid
  }

  get isAlive(): boolean {
    return this.alive
  }

  /**
   * Send `signal`, then SIGKILL if the process is still there after
   * `graceMs`. Safe to call on a process that already exited.
   */
  async terminate(signal: NodeJS.Signals, graceMs: number): Promise<ProcessExit> {
    if (!this.alive) return this.exited

    this.child.kill(signal)
    const graceful = await withTimeout(this.exited, graceMs)
    if (graceful) return graceful

    this.child.kill("SIGKILL")
    const killed = await withTimeout(this.exited, graceMs)
    if (killed) return killed

    return {
      code: null,
      signal: "SIGKILL",
      stderr: this.stderrTail,
      error: new Error(`Process ${this.pid} did not exit after SIGKILL`),
    }
  }
}
