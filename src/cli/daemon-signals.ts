export interface DaemonSignalCallbacks {
  /** SIGUSR1: software stand-in for a double tap */
  onToggle: () => void
  /** First SIGINT/SIGTERM */
  onTerminate: (signal: NodeJS.Signals) => void
  /** Any termination signal after the first */
  onForceExit: (signal: NodeJS.Signals) => void
}

/**
 * Signal handler for the device runtime.
 * Handles SIGUSR1, SIGINT and SIGTERM.
 */
export class DaemonSignalHandler {
  private isSetup = false
  private terminating = false

  private readonly onToggle = () => this.callbacks.onToggle()
  private readonly onTermination = (signal: NodeJS.Signals) => {
    if (this.terminating) {
      this.callbacks.onForceExit(signal)
      return
    }
    this.terminating = true
    this.callbacks.onTerminate(signal)
  }

  constructor(
    private readonly callbacks: DaemonSignalCallbacks,
    private readonly target: NodeJS.EventEmitter = process,
  ) {}

  /**
   * Setup signal handlers
   */
  setup(): void {
    if (this.isSetup) return
    this.target.on("SIGUSR1", this.onToggle)
    this.target.on("SIGINT", this.onTermination)
    this.target.on("SIGTERM", this.onTermination)
    this.isSetup = true
  }

  /**
   * Remove the handlers installed by setup
   */
  cleanup(): void {
    this.target.off("SIGUSR1", this.onToggle)
    this.target.off("SIGINT", this.onTermination)
    this.target.off("SIGTERM", this.onTermination)
    this.isSetup = false
  }
}
