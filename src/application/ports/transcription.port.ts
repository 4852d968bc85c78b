import type { Result } from "../../domain/shared/result"

/**
 * Error that occurs during transcription
 */
export class TranscriptionError extends Error {
  readonly code = "TRANSCRIPTION_ERROR"

  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = "TranscriptionError"
  }
}

/**
 * A recognised stretch of speech, times in seconds
 */
export interface TranscriptSegment {
  start: number
  end: number
  text: string
}

/**
 * Raw engine output before post-processing
 */
export interface TranscriptionResponse {
  text: string
  segments: TranscriptSegment[]
}

/**
 * Port interface for speech to text engines.
 * Infrastructure layer implements this interface.
 */
export interface TranscriberPort {
  /**
   * Human-readable engine name for status messages
   */
  readonly name: string

  /**
   * Resample an audio file to 16 kHz mono WAV
   * @returns Path of the converted file
   */
  convertTo16kHz(filePath: string): Promise<Result<string, TranscriptionError>>

  /**
   * Run speech recognition on an audio file
   */
  getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>>

  /**
   * Turn an engine response into display text. Empty when nothing was
   * recognised.
   */
  processResponse(response: TranscriptionResponse): string
}
