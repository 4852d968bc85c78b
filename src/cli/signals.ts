import { EXIT_CODES } from "./parser"

/**
 * Signal handler for graceful shutdown of the live session.
 * Handles SIGINT (Ctrl+C) and SIGTERM.
 */
export class SignalHandler {
  private cleanupCallbacks: Array<() => Promise<void> | void> = []
  private isShuttingDown = false
  private readonly listener = (signal: NodeJS.Signals) => {
    void this.handle(signal)
  }

  constructor(
    private readonly onCleanupError?: (error: unknown) => void,
    private readonly exit: (code: number) => void = (code) =>
      process.exit(code),
  ) {
    process.on("SIGINT", this.listener)
    process.on("SIGTERM", this.listener)
  }

  /**
   * Register a cleanup callback to run on shutdown
   */
  onCleanup(callback: () => Promise<void> | void): void {
    this.cleanupCallbacks.push(callback)
  }

  /**
   * Check if shutdown is in progress
   */
  get shuttingDown(): boolean {
    return this.isShuttingDown
  }

  /**
   * Run cleanup callbacks, then exit with 130 (128 + SIGINT).
   * A second signal exits immediately.
   */
  async handle(_signal: NodeJS.Signals): Promise<void> {
    if (this.isShuttingDown) {
      this.exit(EXIT_CODES.INTERRUPTED)
      return
    }

    this.isShuttingDown = true

    for (const callback of this.cleanupCallbacks) {
      try {
        await callback()
      } catch (error) {
        this.onCleanupError?.(error)
      }
    }

    this.exit(EXIT_CODES.INTERRUPTED)
  }

  /**
   * Remove signal handlers
   */
  removeHandlers(): void {
    process.off("SIGINT", this.listener)
    process.off("SIGTERM", this.listener)
  }
}
