import chalk from "chalk"
import ora, { type Ora } from "ora"
import type { AudioDevice } from "../application/ports/audio-device.port"
import type { CaptureSource } from "../application/services/config-merger"

/**
 * CLI presenter for formatted output using ora and chalk.
 * Handles spinners, colors, and POSIX-compliant output streams.
 */
export class Presenter {
  private spinner: Ora | null = null

  /**
   * Start a spinner with a message (writes to stderr)
   */
  startSpinner(message: string): void {
    this.spinner = ora({
      text: message,
      stream: process.stderr,
    }).start()
  }

  /**
   * Stop the spinner with a success message
   */
  spinnerSuccess(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message)
      this.spinner = null
    }
  }

  /**
   * Stop the spinner with a failure message, or print it as an error
   * when no spinner is running
   */
  spinnerFail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message)
      this.spinner = null
      return
    }
    this.error(message)
  }

  /**
   * Write info message to stderr
   */
  info(message: string): void {
    console.error(chalk.blue("ℹ"), message)
  }

  /**
   * Write success message to stderr
   */
  success(message: string): void {
    console.error(chalk.green("✓"), message)
  }

  /**
   * Write warning message to stderr
   */
  warn(message: string): void {
    console.error(chalk.yellow("⚠"), message)
  }

  /**
   * Write error message to stderr
   */
  error(message: string): void {
    console.error(chalk.red("✗"), message)
  }

  /**
   * Write one live transcript line to stdout
   */
  transcript(source: CaptureSource, text: string): void {
    const label =
      source === "microphone" ? chalk.cyan("You") : chalk.magenta("Speaker")
    console.log(`${label}: ${text}`)
  }

  /**
   * Print the device table to stdout, capture sources first
   */
  devices(devices: AudioDevice[]): void {
    const sections: Array<[string, AudioDevice[]]> = [
      [
        "Capture sources (microphones and speaker monitors)",
        devices.filter((device) => device.kind === "source"),
      ],
      [
        "Playback sinks (capture one through its .monitor source index)",
        devices.filter((device) => device.kind === "sink"),
      ],
    ]

    for (const [title, group] of sections) {
      console.log(chalk.bold(title))
      if (group.length === 0) {
        console.log("  (none)")
      }
      for (const device of group) {
        console.log(formatDeviceLine(device))
      }
      console.log("")
    }
  }
}

/**
 * One device as "  [3] name  driver, spec, STATE"
 */
export function formatDeviceLine(device: AudioDevice): string {
  const details = [device.driver, device.sampleSpec, device.state]
    .filter((detail) => detail.length > 0)
    .join(", ")
  return `  [${device.index}] ${device.name}${details ? `  ${details}` : ""}`
}
