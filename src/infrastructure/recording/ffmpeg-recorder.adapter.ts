import { type ChildProcess, spawn } from "node:child_process"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
  type AudioRecorderPort,
  RecordingError,
} from "../../application/ports/audio-recorder.port"
import type { Duration } from "../../domain/recording/value-objects/duration.vo"
import { Result } from "../../domain/shared/result"

/** Pulse source that captures whatever the default sink plays */
export const DEFAULT_MONITOR_SOURCE = "@DEFAULT_MONITOR@"

/**
 * FFmpeg-based audio recorder adapter for Pipewire/PulseAudio on Linux.
 * Records 16 kHz mono WAV, which every supported engine accepts.
 * Implements the AudioRecorderPort interface.
 */
export class FFmpegRecorderAdapter implements AudioRecorderPort {
  private device: string
  private currentProcess: ChildProcess | null = null
  private shouldStop = false

  /**
   * @param initialDevice - Pulse source used until setDevice is called
   */
  constructor(
    private readonly label: string,
    private readonly binary = "ffmpeg",
    initialDevice = "default",
  ) {
    this.device = initialDevice
  }

  /**
   * Pulse accepts a source index wherever it accepts a source name
   */
  setDevice(index: number): void {
    this.device = index.toString()
  }

  recordingArgs(duration: Duration, outputPath: string): string[] {
    // -f pulse -i <device>: Pipewire/PulseAudio source (index or name)
    // -t: chunk length, -ar 16000 -ac 1: 16kHz mono for speech models
    return [
      "-hide_banner",
      "-loglevel",
      "error",
      "-f",
      "pulse",
      "-i",
      this.device,
      "-t",
      duration.toSeconds().toString(),
      "-ar",
      "16000",
      "-ac",
      "1",
      "-y",
      outputPath,
    ]
  }

  async record(duration: Duration): Promise<Result<string, RecordingError>> {
    this.shouldStop = false
    const outputPath = join(
      tmpdir(),
      `transcribe-${this.label}-${Date.now()}.wav`,
    )
    const args = this.recordingArgs(duration, outputPath)

    return new Promise((resolve) => {
      const child = spawn(this.binary, args, {
        stdio: ["ignore", "ignore", "pipe"],
      })
      this.currentProcess = child

      let stderr = ""
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString()
      })

      child.on("error", (error) => {
        this.currentProcess = null
        resolve(
          Result.err(
            new RecordingError(
              `Could not start ${this.binary}: ${error.message}`,
              error,
            ),
          ),
        )
      })

      child.on("close", (code) => {
        this.currentProcess = null
        if (code !== 0 && !this.shouldStop) {
          resolve(
            Result.err(
              new RecordingError(
                `FFmpeg recording from ${this.label} (device ${this.device}) failed: ${stderr.trim()}`,
              ),
            ),
          )
          return
        }
        resolve(Result.ok(outputPath))
      })
    })
  }

  /**
   * Stop any ongoing recording early. SIGINT lets FFmpeg finalize the file.
   */
  async stop(): Promise<void> {
    if (!this.currentProcess) {
      return
    }

    this.shouldStop = true
    this.currentProcess.kill("SIGINT")
  }
}
