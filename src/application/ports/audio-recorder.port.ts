import type { Duration } from "../../domain/recording/value-objects/duration.vo"
import type { Result } from "../../domain/shared/result"

/**
 * Error that occurs during audio recording
 */
export class RecordingError extends Error {
  readonly code = "RECORDING_ERROR"

  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = "RecordingError"
  }
}

/**
 * Port interface for audio capture from one source
 * (microphone or speaker loopback).
 */
export interface AudioRecorderPort {
  /**
   * Capture from the device with this index instead of the system default
   */
  setDevice(index: number): void

  /**
   * Record for the given duration
   * @returns Path of a temporary WAV file holding the recording
   */
  record(duration: Duration): Promise<Result<string, RecordingError>>

  /**
   * Stop any ongoing recording early
   */
  stop(): Promise<void>
}

/**
 * The two capture sources of a live session
 */
export interface CaptureRecorders {
  microphone: AudioRecorderPort
  speaker: AudioRecorderPort
}
